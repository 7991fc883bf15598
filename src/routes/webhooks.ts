/**
 * Webhook Routes
 * @module routes/webhooks
 *
 * External change notifications. A push to a repository triggers every
 * Application sourced from it whose last synced revision differs.
 *
 * Endpoints:
 * - POST /api/v1/webhooks/git - `{ repoURL, revision? }`
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { Type, Static } from '@sinclair/typebox';
import { UnauthorizedError } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import { ErrorResponseSchema } from './schemas/common.js';

const logger = createModuleLogger('webhook-routes');

export const SIGNATURE_HEADER = 'x-driftguard-signature';

// ============================================================================
// Schemas
// ============================================================================

export const GitWebhookPayloadSchema = Type.Object({
  repoURL: Type.String({ minLength: 1, description: 'Repository URL as written in Application sources' }),
  revision: Type.Optional(Type.String({ minLength: 1, description: 'Commit now at the tip' })),
});

export type GitWebhookPayload = Static<typeof GitWebhookPayloadSchema>;

export const WebhookAckResponseSchema = Type.Object({
  received: Type.Boolean(),
  triggered: Type.Array(Type.String()),
});

export type WebhookAckResponse = Static<typeof WebhookAckResponseSchema>;

// ============================================================================
// Signature Verification
// ============================================================================

/**
 * Checks `sha256=<hex>` against the HMAC of the payload
 */
export function verifySignature(payload: string, signature: string | undefined, secret: string): boolean {
  if (!signature?.startsWith('sha256=')) {
    return false;
  }
  const expected = Buffer.from(`sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`);
  const received = Buffer.from(signature);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

export function signPayload(payload: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

// ============================================================================
// Route Implementation
// ============================================================================

export interface WebhookRouteOptions {
  /** Require a valid signature when set */
  secret?: string;
}

const webhookRoutes: FastifyPluginAsync<WebhookRouteOptions> = async (
  fastify: FastifyInstance,
  options: WebhookRouteOptions
): Promise<void> => {
  fastify.post<{ Body: GitWebhookPayload; Reply: WebhookAckResponse }>(
    '/git',
    {
      schema: {
        description: 'Notify a source change',
        tags: ['Webhooks'],
        body: GitWebhookPayloadSchema,
        response: {
          200: WebhookAckResponseSchema,
          400: ErrorResponseSchema,
          401: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      if (options.secret) {
        const header = request.headers[SIGNATURE_HEADER];
        const signature = Array.isArray(header) ? header[0] : header;
        if (!verifySignature(JSON.stringify(request.body), signature, options.secret)) {
          logger.warn({ repoURL: request.body.repoURL }, 'Invalid webhook signature');
          throw new UnauthorizedError('Invalid webhook signature');
        }
      }

      const { repoURL, revision } = request.body;
      const triggered = fastify.controller.scheduler.notifyRevision(repoURL, revision);
      return reply.send({ received: true, triggered });
    }
  );
};

export default webhookRoutes;
