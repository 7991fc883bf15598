/**
 * Prometheus Metrics Route
 * @module routes/metrics
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { getMetrics, getMetricsContentType } from '../logging/index.js';

const metricsRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * GET /metrics
   */
  fastify.get('/metrics', { schema: { tags: ['Metrics'] } }, async (_request, reply) => {
    const body = await getMetrics();
    return reply.header('content-type', getMetricsContentType()).send(body);
  });
};

export default metricsRoutes;
