/**
 * Route Registration
 * @module routes
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { API } from '../constants/index.js';
import healthRoutes from './health.js';
import metricsRoutes from './metrics.js';
import applicationRoutes from './applications.js';
import webhookRoutes from './webhooks.js';

export interface RouteOptions {
  webhookSecret?: string;
}

const routes: FastifyPluginAsync<RouteOptions> = async (
  fastify: FastifyInstance,
  options: RouteOptions
): Promise<void> => {
  // Probes and metrics at the root
  await fastify.register(healthRoutes);
  await fastify.register(metricsRoutes);

  await fastify.register(applicationRoutes, { prefix: `${API.BASE_PATH}/applications` });
  await fastify.register(webhookRoutes, { prefix: `${API.BASE_PATH}/webhooks`, secret: options.webhookSecret });
};

export default routes;
