/**
 * Resource Ownership Registry
 * @module applications/ownership
 *
 * Tracks which Application claims each resource identity. Overlapping claims
 * are settled by policy: the existing owner keeps the resource
 * (`first-writer-wins`), or the later-registered Application takes it
 * (`last-writer-wins`).
 */

import { OwnershipConflictError } from '../errors/index.js';

export const OwnershipPolicy = {
  FIRST_WRITER_WINS: 'first-writer-wins',
  LAST_WRITER_WINS: 'last-writer-wins',
} as const;

export type OwnershipPolicy = typeof OwnershipPolicy[keyof typeof OwnershipPolicy];

export interface ClaimOutcome {
  granted: string[];
  /** Keys taken over from another Application */
  transferred: Array<{ key: string; from: string }>;
  conflicts: OwnershipConflictError[];
}

export class OwnershipRegistry {
  private readonly owners = new Map<string, string>();
  private readonly claimsByApp = new Map<string, Set<string>>();

  /**
   * @param rank - registration order of an Application; higher is newer
   */
  constructor(
    readonly policy: OwnershipPolicy = OwnershipPolicy.FIRST_WRITER_WINS,
    private readonly rank: (application: string) => number = () => 0
  ) {}

  ownerOf(key: string): string | undefined {
    return this.owners.get(key);
  }

  claimsOf(application: string): string[] {
    return [...(this.claimsByApp.get(application) ?? [])].sort();
  }

  /**
   * Replaces the claims of `application` with `keys`. Keys it no longer
   * declares are released.
   */
  claim(application: string, keys: Iterable<string>): ClaimOutcome {
    const outcome: ClaimOutcome = { granted: [], transferred: [], conflicts: [] };
    const wanted = new Set(keys);

    for (const key of this.claimsOf(application)) {
      if (!wanted.has(key)) this.release(application, key);
    }

    for (const key of [...wanted].sort()) {
      const owner = this.owners.get(key);
      if (owner === undefined || owner === application) {
        this.assign(application, key);
        outcome.granted.push(key);
        continue;
      }

      if (this.policy === OwnershipPolicy.LAST_WRITER_WINS && this.rank(application) > this.rank(owner)) {
        this.release(owner, key);
        this.assign(application, key);
        outcome.granted.push(key);
        outcome.transferred.push({ key, from: owner });
        continue;
      }

      outcome.conflicts.push(new OwnershipConflictError(key, owner, application));
    }

    return outcome;
  }

  release(application: string, key: string): void {
    if (this.owners.get(key) === application) {
      this.owners.delete(key);
    }
    this.claimsByApp.get(application)?.delete(key);
  }

  releaseAll(application: string): string[] {
    const released = this.claimsOf(application);
    for (const key of released) {
      this.release(application, key);
    }
    this.claimsByApp.delete(application);
    return released;
  }

  private assign(application: string, key: string): void {
    this.owners.set(key, application);
    const claims = this.claimsByApp.get(application) ?? new Set<string>();
    claims.add(key);
    this.claimsByApp.set(application, claims);
  }
}
