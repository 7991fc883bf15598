/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Domain-specific error classes for the reconciler.
 * These errors represent source, runtime, sync and application graph failures.
 */

import { BaseError, ErrorContext, SerializedError } from './base.js';
import {
  HttpErrorCodes,
  SourceErrorCodes,
  RuntimeErrorCodes,
  SyncErrorCodes,
  InfrastructureErrorCodes,
} from './codes.js';

// ============================================================================
// Source Errors
// ============================================================================

/**
 * The source locator could not be fetched, or the path escapes the repository
 */
export class SourceUnreachableError extends BaseError {
  public readonly repoURL: string;

  constructor(message: string, repoURL: string, context: ErrorContext = {}) {
    super(message, SourceErrorCodes.SOURCE_UNREACHABLE, context);
    this.name = 'SourceUnreachableError';
    this.repoURL = repoURL;
  }
}

/**
 * A document in the source tree is not a valid resource manifest
 */
export class MalformedResourceError extends BaseError {
  public readonly file: string;
  public readonly documentIndex: number;

  constructor(
    message: string,
    file: string,
    documentIndex: number,
    context: ErrorContext = {}
  ) {
    super(message, SourceErrorCodes.MALFORMED_RESOURCE, context);
    this.name = 'MalformedResourceError';
    this.file = file;
    this.documentIndex = documentIndex;
  }

  toJSON(): SerializedError & { file: string; documentIndex: number } {
    return {
      ...super.toJSON(),
      file: this.file,
      documentIndex: this.documentIndex,
    };
  }
}

/**
 * An Application manifest is missing required fields
 */
export class InvalidApplicationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, SourceErrorCodes.INVALID_APPLICATION, context);
    this.name = 'InvalidApplicationError';
  }
}

// ============================================================================
// Runtime Errors
// ============================================================================

/**
 * Listing or reading live state failed
 */
export class ObservationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, RuntimeErrorCodes.OBSERVATION_ERROR, context);
    this.name = 'ObservationError';
  }
}

/**
 * The resourceVersion supplied with an update is stale
 */
export class ApplyConflictError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, RuntimeErrorCodes.APPLY_CONFLICT, context);
    this.name = 'ApplyConflictError';
  }
}

/**
 * The runtime refused the manifest (validation, admission, missing namespace)
 */
export class ApplyRejectedError extends BaseError {
  public readonly reason: string;

  constructor(message: string, reason: string, context: ErrorContext = {}) {
    super(message, RuntimeErrorCodes.APPLY_REJECTED, context);
    this.name = 'ApplyRejectedError';
    this.reason = reason;
  }
}

/**
 * The runtime could not be reached
 */
export class RuntimeUnavailableError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, RuntimeErrorCodes.RUNTIME_UNAVAILABLE, context);
    this.name = 'RuntimeUnavailableError';
  }
}

export class UnknownDestinationError extends BaseError {
  constructor(destination: string, context: ErrorContext = {}) {
    super(`No runtime registered for destination '${destination}'`, RuntimeErrorCodes.UNKNOWN_DESTINATION, {
      ...context,
      details: { destination, ...context.details },
    });
    this.name = 'UnknownDestinationError';
  }
}

// ============================================================================
// Sync Errors
// ============================================================================

/**
 * An operation was skipped because something it depends on failed
 */
export class DependencyFailedError extends BaseError {
  /** Identity key of the first failure in the chain */
  public readonly rootCause: string;

  constructor(resource: string, rootCause: string, context: ErrorContext = {}) {
    super(`Dependency ${rootCause} failed`, SyncErrorCodes.DEPENDENCY_FAILED, {
      ...context,
      resource,
    });
    this.name = 'DependencyFailedError';
    this.rootCause = rootCause;
  }
}

export class SyncCancelledError extends BaseError {
  constructor(message = 'Sync cancelled before operation started', context: ErrorContext = {}) {
    super(message, SyncErrorCodes.SYNC_CANCELLED, context);
    this.name = 'SyncCancelledError';
  }
}

// ============================================================================
// Application Graph Errors
// ============================================================================

/**
 * A child Application edge would close a cycle
 */
export class CyclicApplicationGraphError extends BaseError {
  public readonly parent: string;
  public readonly child: string;
  public readonly path: string[];

  constructor(parent: string, child: string, path: string[], context: ErrorContext = {}) {
    super(
      `Application '${parent}' cannot declare '${child}': cycle ${path.join(' -> ')}`,
      SyncErrorCodes.CYCLIC_APPLICATION_GRAPH,
      { ...context, application: parent, details: { child, path } }
    );
    this.name = 'CyclicApplicationGraphError';
    this.parent = parent;
    this.child = child;
    this.path = path;
  }
}

/**
 * A resource or child Application is already owned by another Application
 */
export class OwnershipConflictError extends BaseError {
  public readonly owner: string;
  public readonly claimant: string;

  constructor(subject: string, owner: string, claimant: string, context: ErrorContext = {}) {
    super(
      `'${subject}' is owned by '${owner}' and cannot be claimed by '${claimant}'`,
      SyncErrorCodes.OWNERSHIP_CONFLICT,
      { ...context, application: claimant, resource: subject, details: { owner } }
    );
    this.name = 'OwnershipConflictError';
    this.owner = owner;
    this.claimant = claimant;
  }
}

export class InvalidStateTransitionError extends BaseError {
  constructor(application: string, from: string, to: string) {
    super(
      `Application '${application}' cannot move from ${from} to ${to}`,
      SyncErrorCodes.INVALID_STATE_TRANSITION,
      { application, details: { from, to } }
    );
    this.name = 'InvalidStateTransitionError';
  }
}

export class ApplicationNotFoundError extends BaseError {
  constructor(application: string) {
    super(`Application '${application}' not found`, SyncErrorCodes.APPLICATION_NOT_FOUND, {
      application,
    });
    this.name = 'ApplicationNotFoundError';
  }
}

export class NoPendingPlanError extends BaseError {
  constructor(application: string) {
    super(`Application '${application}' has no plan awaiting approval`, SyncErrorCodes.NO_PENDING_PLAN, {
      application,
    });
    this.name = 'NoPendingPlanError';
  }
}

// ============================================================================
// Infrastructure Errors
// ============================================================================

export class ConfigurationError extends BaseError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context: ErrorContext = {}) {
    super(message, InfrastructureErrorCodes.CONFIGURATION_ERROR, {
      ...context,
      details: { issues, ...context.details },
    }, false);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class DatabaseError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, InfrastructureErrorCodes.DATABASE_ERROR, context);
    this.name = 'DatabaseError';
  }
}

/**
 * Request validation failure raised by route handlers
 */
export class ValidationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, HttpErrorCodes.VALIDATION_ERROR, context);
    this.name = 'ValidationError';
  }
}

/**
 * Webhook signature missing or wrong
 */
export class UnauthorizedError extends BaseError {
  constructor(message = 'Unauthorized', context: ErrorContext = {}) {
    super(message, HttpErrorCodes.UNAUTHORIZED, context);
    this.name = 'UnauthorizedError';
  }
}
