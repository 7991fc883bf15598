/**
 * Application Routes
 * @module routes/applications
 *
 * Endpoints:
 * - GET    /api/v1/applications                 - List Applications with status
 * - GET    /api/v1/applications/:name           - Application status
 * - POST   /api/v1/applications/:name/sync      - Queue a manual sync
 * - POST   /api/v1/applications/:name/confirm   - Approve the pending plan
 * - POST   /api/v1/applications/:name/cancel    - Cancel the in-flight sync
 * - DELETE /api/v1/applications/:name           - Remove an Application
 * - GET    /api/v1/applications/:name/results   - Last per-resource results
 * - GET    /api/v1/applications/:name/history   - Recent sync runs
 * - GET    /api/v1/applications/:name/plan      - Pending or last plan
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Controller } from '../controller.js';
import { getErrorMessage } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import { ErrorResponseSchema, ApplicationNameParamsSchema, type ApplicationNameParams } from './schemas/common.js';
import {
  AcceptedResponseSchema,
  ApplicationListResponseSchema,
  ApplicationStatusSchema,
  DeleteQuerySchema,
  DeleteResponseSchema,
  HistoryQuerySchema,
  HistoryResponseSchema,
  PlanResponseSchema,
  SyncResultsResponseSchema,
  type AcceptedResponse,
  type ApplicationListResponse,
  type ApplicationStatusResponse,
  type DeleteQuery,
  type DeleteResponse,
  type HistoryQuery,
  type HistoryResponse,
  type PlanResponse,
  type SyncResultsResponse,
} from './schemas/application.js';
import { API } from '../constants/index.js';

const logger = createModuleLogger('application-routes');

function statusOf(controller: Controller, name: string): ApplicationStatusResponse {
  const status = controller.graph.status(name);
  const record = controller.graph.require(name);
  return {
    ...status,
    syncing: controller.scheduler.isRunning(name),
    awaitingApproval: record.pendingPlan !== null,
  };
}

/**
 * Runs a scheduler request in the background; its completion is only logged
 */
function detach(task: Promise<void>, application: string, action: string): void {
  task.then(
    () => logger.debug({ application, action }, 'Requested cycle finished'),
    (error: unknown) => logger.error({ application, action, err: error }, `Requested ${action} failed: ${getErrorMessage(error)}`)
  );
}

const applicationRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  const controller = fastify.controller;

  fastify.get<{ Reply: ApplicationListResponse }>(
    '/',
    {
      schema: {
        description: 'List Applications with their status',
        tags: ['Applications'],
        response: { 200: ApplicationListResponseSchema },
      },
    },
    async (_request, reply) => {
      const data = controller.graph.names().map(name => statusOf(controller, name));
      return reply.send({ data, total: data.length });
    }
  );

  fastify.get<{ Params: ApplicationNameParams; Reply: ApplicationStatusResponse }>(
    '/:name',
    {
      schema: {
        description: 'Get Application status',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 200: ApplicationStatusSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      return reply.send(statusOf(controller, request.params.name));
    }
  );

  fastify.post<{ Params: ApplicationNameParams; Reply: AcceptedResponse }>(
    '/:name/sync',
    {
      schema: {
        description: 'Queue a manual sync. Manual Applications compute a plan that awaits confirmation.',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 202: AcceptedResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const { name } = request.params;
      detach(controller.scheduler.syncNow(name), name, 'sync');
      return reply.status(202).send({ application: name, accepted: true, message: 'Sync queued' });
    }
  );

  fastify.post<{ Params: ApplicationNameParams; Reply: AcceptedResponse }>(
    '/:name/confirm',
    {
      schema: {
        description: 'Approve the plan awaiting confirmation',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 202: AcceptedResponseSchema, 404: ErrorResponseSchema, 409: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const { name } = request.params;
      detach(controller.scheduler.confirm(name), name, 'confirm');
      return reply.status(202).send({ application: name, accepted: true, message: 'Plan approved' });
    }
  );

  fastify.post<{ Params: ApplicationNameParams; Reply: AcceptedResponse }>(
    '/:name/cancel',
    {
      schema: {
        description: 'Cancel the in-flight sync',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 200: AcceptedResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const { name } = request.params;
      const cancelled = controller.scheduler.cancel(name);
      return reply.send({
        application: name,
        accepted: cancelled,
        message: cancelled ? 'Sync cancelled' : 'No sync in progress',
      });
    }
  );

  fastify.delete<{ Params: ApplicationNameParams; Querystring: DeleteQuery; Reply: DeleteResponse }>(
    '/:name',
    {
      schema: {
        description: 'Remove an Application and its subtree; with cascade, delete their owned resources',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        querystring: DeleteQuerySchema,
        response: { 200: DeleteResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const outcome = await controller.deleteApplication(request.params.name, request.query.cascade ?? true);
      return reply.send(outcome);
    }
  );

  fastify.get<{ Params: ApplicationNameParams; Reply: SyncResultsResponse }>(
    '/:name/results',
    {
      schema: {
        description: 'Per-resource results of the last executed sync',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 200: SyncResultsResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const record = controller.graph.require(request.params.name);
      return reply.send({ application: record.name, data: record.lastResults });
    }
  );

  fastify.get<{ Params: ApplicationNameParams; Querystring: HistoryQuery; Reply: HistoryResponse }>(
    '/:name/history',
    {
      schema: {
        description: 'Recent sync runs, newest first',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        querystring: HistoryQuerySchema,
        response: { 200: HistoryResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const record = controller.graph.require(request.params.name);
      const runs = await controller.history.list(record.name, {
        limit: request.query.limit ?? API.DEFAULT_HISTORY_LIMIT,
      });
      return reply.send({ application: record.name, data: runs });
    }
  );

  fastify.get<{ Params: ApplicationNameParams; Reply: PlanResponse }>(
    '/:name/plan',
    {
      schema: {
        description: 'Plan awaiting confirmation, or the last computed plan',
        tags: ['Applications'],
        params: ApplicationNameParamsSchema,
        response: { 200: PlanResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const record = controller.graph.require(request.params.name);
      const pending = record.pendingPlan;
      if (pending) {
        return reply.send({
          application: record.name,
          pending: true,
          runId: pending.runId,
          revision: pending.revision,
          createdAt: pending.createdAt,
          operations: pending.operations,
        });
      }
      return reply.send({
        application: record.name,
        pending: false,
        runId: null,
        revision: record.revision,
        createdAt: null,
        operations: record.lastPlan,
      });
    }
  );
};

export default applicationRoutes;
