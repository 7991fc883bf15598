/**
 * Application Type Definitions
 * @module types/application
 *
 * Application specs as declared in manifests, the effective sync policy, and
 * the lifecycle phases tracked by the application graph.
 */

// ============================================================================
// Sync Policy
// ============================================================================

export const SyncMode = {
  AUTOMATED: 'automated',
  MANUAL: 'manual',
} as const;

export type SyncMode = typeof SyncMode[keyof typeof SyncMode];

export interface SyncPolicy {
  mode: SyncMode;
  /** Delete live objects no longer declared */
  prune: boolean;
  /** Correct live drift without a source change */
  selfHeal: boolean;
}

/**
 * Policy fields an Application manifest states explicitly; the rest inherit
 */
export type DeclaredSyncPolicy = Partial<SyncPolicy>;

export const ROOT_DEFAULT_POLICY: Readonly<SyncPolicy> = {
  mode: SyncMode.MANUAL,
  prune: false,
  selfHeal: false,
};

// ============================================================================
// Source and Destination
// ============================================================================

export interface SourceLocator {
  /** `file://` URL, absolute path, or git remote */
  repoURL: string;
  /** Branch, tag or commit; `HEAD` when unspecified */
  revision: string;
  /** Directory within the repository */
  path: string;
  recurse: boolean;
}

export interface Destination {
  server?: string;
  name?: string;
  /** Default namespace for namespaced objects without one */
  namespace: string;
}

/**
 * Fields excluded from comparison for matching resources
 */
export interface IgnoreDifference {
  group?: string;
  kind: string;
  name?: string;
  namespace?: string;
  jsonPointers: string[];
}

/**
 * An Application as declared in its manifest
 */
export interface ApplicationSpec {
  name: string;
  source: SourceLocator;
  destination: Destination;
  policy: DeclaredSyncPolicy;
  ignoreDifferences: IgnoreDifference[];
}

// ============================================================================
// Lifecycle
// ============================================================================

export const ApplicationPhase = {
  PENDING: 'Pending',
  SYNCING: 'Syncing',
  SYNCED: 'Synced',
  DEGRADED: 'Degraded',
} as const;

export type ApplicationPhase = typeof ApplicationPhase[keyof typeof ApplicationPhase];

export const SyncStatus = {
  SYNCED: 'Synced',
  OUT_OF_SYNC: 'OutOfSync',
  UNKNOWN: 'Unknown',
} as const;

export type SyncStatus = typeof SyncStatus[keyof typeof SyncStatus];

/**
 * Read-only view of an Application's state
 */
export interface ApplicationStatus {
  name: string;
  parent: string | null;
  children: string[];
  phase: ApplicationPhase;
  aggregatedPhase: ApplicationPhase;
  syncStatus: SyncStatus;
  policy: SyncPolicy;
  source: SourceLocator;
  destination: Destination;
  revision: string | null;
  lastSyncedAt: string | null;
  message: string | null;
  ownedResources: number;
}
