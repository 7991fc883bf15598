/**
 * Health Check Routes
 * @module routes/health
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { Type, Static } from '@sinclair/typebox';

const startTime = Date.now();

function getVersion(): string {
  return process.env.SERVICE_VERSION || process.env.npm_package_version || '0.1.0';
}

function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

// ============================================================================
// Schemas
// ============================================================================

export const HealthCheckSchema = Type.Object({
  status: Type.Literal('healthy'),
  timestamp: Type.String(),
  version: Type.String(),
  uptime: Type.Number(),
  applications: Type.Number(),
});

export type HealthCheck = Static<typeof HealthCheckSchema>;

export const LivenessProbeSchema = Type.Object({
  alive: Type.Boolean(),
  timestamp: Type.String(),
});

export type LivenessProbe = Static<typeof LivenessProbeSchema>;

export const ReadinessProbeSchema = Type.Object({
  ready: Type.Boolean(),
  timestamp: Type.String(),
  dependencies: Type.Record(Type.String(), Type.Boolean()),
});

export type ReadinessProbe = Static<typeof ReadinessProbeSchema>;

// ============================================================================
// Routes
// ============================================================================

const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * GET /health
   */
  fastify.get<{ Reply: HealthCheck }>(
    '/health',
    { schema: { tags: ['Health'], response: { 200: HealthCheckSchema } } },
    async (_request, reply) => {
      return reply.status(200).send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: getVersion(),
        uptime: getUptime(),
        applications: fastify.controller.graph.names().length,
      });
    }
  );

  /**
   * Liveness probe
   * GET /health/live
   */
  fastify.get<{ Reply: LivenessProbe }>(
    '/health/live',
    { schema: { tags: ['Health'], response: { 200: LivenessProbeSchema } } },
    async (_request, reply) => {
      return reply.status(200).send({ alive: true, timestamp: new Date().toISOString() });
    }
  );

  /**
   * Readiness probe: scheduler running and history store reachable
   * GET /health/ready
   */
  fastify.get<{ Reply: ReadinessProbe }>(
    '/health/ready',
    {
      schema: {
        tags: ['Health'],
        response: { 200: ReadinessProbeSchema, 503: ReadinessProbeSchema },
      },
    },
    async (_request, reply) => {
      const report = await fastify.controller.readiness();
      return reply.status(report.ready ? 200 : 503).send({
        ready: report.ready,
        timestamp: new Date().toISOString(),
        dependencies: report.checks,
      });
    }
  );
};

export default healthRoutes;
