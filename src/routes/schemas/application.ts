/**
 * Application API Schemas
 * @module routes/schemas/application
 *
 * TypeBox schemas for Application status, sync results, plans and runs.
 */

import { Type, Static } from '@sinclair/typebox';
import { API } from '../../constants/index.js';

const PhaseSchema = Type.Union([
  Type.Literal('Pending'),
  Type.Literal('Syncing'),
  Type.Literal('Synced'),
  Type.Literal('Degraded'),
]);

const NullableString = Type.Union([Type.String(), Type.Null()]);

// ============================================================================
// Status
// ============================================================================

export const SyncPolicySchema = Type.Object({
  mode: Type.Union([Type.Literal('automated'), Type.Literal('manual')]),
  prune: Type.Boolean(),
  selfHeal: Type.Boolean(),
});

export const ApplicationStatusSchema = Type.Object({
  name: Type.String(),
  parent: NullableString,
  children: Type.Array(Type.String()),
  phase: PhaseSchema,
  aggregatedPhase: PhaseSchema,
  syncStatus: Type.Union([Type.Literal('Synced'), Type.Literal('OutOfSync'), Type.Literal('Unknown')]),
  policy: SyncPolicySchema,
  source: Type.Object({
    repoURL: Type.String(),
    revision: Type.String(),
    path: Type.String(),
    recurse: Type.Boolean(),
  }),
  destination: Type.Object({
    server: Type.Optional(Type.String()),
    name: Type.Optional(Type.String()),
    namespace: Type.String(),
  }),
  revision: NullableString,
  lastSyncedAt: NullableString,
  message: NullableString,
  ownedResources: Type.Number(),
  syncing: Type.Boolean({ description: 'A cycle is in flight' }),
  awaitingApproval: Type.Boolean(),
});

export type ApplicationStatusResponse = Static<typeof ApplicationStatusSchema>;

export const ApplicationListResponseSchema = Type.Object({
  data: Type.Array(ApplicationStatusSchema),
  total: Type.Number(),
});

export type ApplicationListResponse = Static<typeof ApplicationListResponseSchema>;

// ============================================================================
// Results and Plans
// ============================================================================

export const SyncResultSchema = Type.Object({
  runId: Type.String(),
  application: Type.String(),
  key: Type.String(),
  kind: Type.String(),
  namespace: Type.String(),
  name: Type.String(),
  operation: Type.String(),
  outcome: Type.String(),
  attempts: Type.Number(),
  timestamp: Type.String(),
  annotations: Type.Array(Type.String()),
  failure: Type.Optional(Type.Object({
    code: Type.String(),
    message: Type.String(),
    rootCause: Type.String(),
  })),
});

export const FieldChangeSchema = Type.Object({
  op: Type.Union([Type.Literal('set'), Type.Literal('remove')]),
  path: Type.String(),
  value: Type.Optional(Type.Unknown()),
  previous: Type.Optional(Type.Unknown()),
});

export const OperationSummarySchema = Type.Object({
  type: Type.String(),
  key: Type.String(),
  kind: Type.String(),
  namespace: Type.String(),
  name: Type.String(),
  annotations: Type.Array(Type.String()),
  changes: Type.Array(FieldChangeSchema),
});

export const SyncResultsResponseSchema = Type.Object({
  application: Type.String(),
  data: Type.Array(SyncResultSchema),
});

export type SyncResultsResponse = Static<typeof SyncResultsResponseSchema>;

export const PlanResponseSchema = Type.Object({
  application: Type.String(),
  pending: Type.Boolean({ description: 'Operations await confirmation' }),
  runId: NullableString,
  revision: NullableString,
  createdAt: NullableString,
  operations: Type.Array(OperationSummarySchema),
});

export type PlanResponse = Static<typeof PlanResponseSchema>;

// ============================================================================
// History
// ============================================================================

export const SyncRunSchema = Type.Object({
  id: Type.String(),
  application: Type.String(),
  trigger: Type.String(),
  revision: NullableString,
  status: Type.String(),
  operations: Type.Array(OperationSummarySchema),
  results: Type.Array(SyncResultSchema),
  startedAt: Type.String(),
  finishedAt: Type.String(),
  error: Type.Optional(Type.Object({
    name: Type.String(),
    code: Type.String(),
    message: Type.String(),
  })),
});

export const HistoryQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({
    minimum: 1,
    maximum: API.MAX_HISTORY_LIMIT,
    default: API.DEFAULT_HISTORY_LIMIT,
  })),
});

export type HistoryQuery = Static<typeof HistoryQuerySchema>;

export const HistoryResponseSchema = Type.Object({
  application: Type.String(),
  data: Type.Array(SyncRunSchema),
});

export type HistoryResponse = Static<typeof HistoryResponseSchema>;

// ============================================================================
// Commands
// ============================================================================

export const AcceptedResponseSchema = Type.Object({
  application: Type.String(),
  accepted: Type.Boolean(),
  message: Type.String(),
});

export type AcceptedResponse = Static<typeof AcceptedResponseSchema>;

export const DeleteQuerySchema = Type.Object({
  cascade: Type.Optional(Type.Boolean({ default: true })),
});

export type DeleteQuery = Static<typeof DeleteQuerySchema>;

export const DeleteResponseSchema = Type.Object({
  removed: Type.Array(Type.String()),
  results: Type.Array(SyncResultSchema),
});

export type DeleteResponse = Static<typeof DeleteResponseSchema>;
