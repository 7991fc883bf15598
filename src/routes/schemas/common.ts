/**
 * Common API Schemas
 * @module routes/schemas/common
 */

import { Type, Static } from '@sinclair/typebox';

// ============================================================================
// Error Schemas
// ============================================================================

export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number({ description: 'HTTP status code' }),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  code: Type.Optional(Type.String({ description: 'Error code for programmatic handling' })),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
  requestId: Type.Optional(Type.String()),
  timestamp: Type.String({ format: 'date-time' }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// ============================================================================
// Parameter Schemas
// ============================================================================

/**
 * Application name (DNS-1123 subdomain)
 */
export const ApplicationNameParamsSchema = Type.Object({
  name: Type.String({
    minLength: 1,
    maxLength: 253,
    pattern: '^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$',
  }),
});

export type ApplicationNameParams = Static<typeof ApplicationNameParamsSchema>;
