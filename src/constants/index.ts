/**
 * Application Constants
 * @module constants
 *
 * Labels, annotations and defaults shared by the loader, diff engine,
 * executor and API.
 */

// ============================================================================
// API Constants
// ============================================================================

export const API = {
  /** Base path for API endpoints */
  BASE_PATH: '/api/v1',
  /** Default number of runs returned by the history endpoint */
  DEFAULT_HISTORY_LIMIT: 20,
  /** Maximum number of runs returned by the history endpoint */
  MAX_HISTORY_LIMIT: 200,
} as const;

// ============================================================================
// Labels and Annotations
// ============================================================================

export const LABELS = {
  MANAGED_BY: 'app.kubernetes.io/managed-by',
  MANAGED_BY_VALUE: 'driftguard',
  /** Name of the Application that owns the object */
  INSTANCE: 'driftguard.io/instance',
} as const;

export const ANNOTATIONS = {
  /** Stable JSON of the manifest as last applied */
  LAST_APPLIED: 'driftguard.io/last-applied',
  SYNC_WAVE: 'driftguard.io/sync-wave',
  /** Accepted for manifests written for Argo CD */
  ARGO_SYNC_WAVE: 'argocd.argoproj.io/sync-wave',
  /** Comma separated `Kind/name` or `Kind/namespace/name` */
  DEPENDS_ON: 'driftguard.io/depends-on',
} as const;

/**
 * Labels selecting every object managed for an Application
 */
export function ownershipLabels(application: string): Record<string, string> {
  return {
    [LABELS.MANAGED_BY]: LABELS.MANAGED_BY_VALUE,
    [LABELS.INSTANCE]: application,
  };
}

// ============================================================================
// Application Manifests
// ============================================================================

export const APPLICATION = {
  KIND: 'Application',
  DEFAULT_NAMESPACE: 'default',
  DEFAULT_REVISION: 'HEAD',
} as const;

/** API groups whose `Application` kind is expanded as a child */
export const APPLICATION_GROUPS: ReadonlySet<string> = new Set(['driftguard.io', 'argoproj.io']);
