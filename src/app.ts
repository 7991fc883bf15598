/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';

import type { Controller } from './controller.js';
import errorHandler from './middleware/error-handler.js';
import { createModuleLogger, metrics } from './logging/index.js';
import routes from './routes/index.js';

export interface AppOptions extends FastifyServerOptions {
  controller: Controller;
  /**
   * Enable CORS
   * @default true
   */
  cors?: boolean;
  /**
   * Enable Helmet security headers
   * @default true
   */
  helmet?: boolean;
  /** Log handled request errors */
  logErrors?: boolean;
}

/**
 * Create and configure the operator API
 */
export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { controller, cors: enableCors = true, helmet: enableHelmet = true, logErrors = true, ...serverOptions } = opts;
  const logger = createModuleLogger('app-factory');

  const app = Fastify({
    logger: { level: controller.config.logging.level },
    ...serverOptions,
    disableRequestLogging: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  app.decorate('controller', controller);

  if (enableCors) {
    await app.register(cors, {
      origin: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
    });
    logger.debug('CORS plugin registered');
  }

  if (enableHelmet) {
    await app.register(helmet, {
      contentSecurityPolicy: controller.config.env === 'production',
      crossOriginEmbedderPolicy: false,
    });
    logger.debug('Helmet plugin registered');
  }

  // Must precede routes
  await app.register(errorHandler, { logErrors });

  app.addHook('onResponse', async (request, reply) => {
    metrics.recordHttpRequest(
      request.method,
      request.routeOptions.url ?? 'unmatched',
      reply.statusCode,
      reply.elapsedTime / 1000
    );
  });

  await app.register(routes, { webhookSecret: controller.config.server.webhookSecret });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing');
  });

  return app;
}

/**
 * Create application for testing (request logging off)
 */
export async function buildTestApp(opts: AppOptions): Promise<FastifyInstance> {
  return buildApp({ ...opts, logger: false, logErrors: false });
}

export default buildApp;

// ============================================================================
// Type Declarations
// ============================================================================

declare module 'fastify' {
  interface FastifyInstance {
    controller: Controller;
  }
}
