/**
 * Field Ownership Policy
 * @module diff/field-policy
 *
 * Decides which fields take part in comparison. Runtime-managed metadata and
 * status are always ignored; `ignoreDifferences` entries add JSON pointers
 * for matching resources.
 */

import type { IgnoreDifference } from '../types/application.js';
import type { ResourceIdentity } from '../types/resource.js';
import { parsePointer } from './normalizer.js';

export const ALWAYS_IGNORED: readonly string[] = [
  '/metadata/uid',
  '/metadata/resourceVersion',
  '/metadata/generation',
  '/metadata/creationTimestamp',
  '/metadata/managedFields',
  '/metadata/selfLink',
  '/status',
];

export class FieldPolicy {
  private readonly rules: IgnoreDifference[];
  private readonly base: string[][];

  constructor(ignoreDifferences: IgnoreDifference[] = []) {
    this.rules = ignoreDifferences;
    this.base = ALWAYS_IGNORED.map(parsePointer);
  }

  /**
   * Ignored paths (as token lists) for one resource
   */
  ignoredPaths(identity: ResourceIdentity): string[][] {
    const paths = [...this.base];
    for (const rule of this.rules) {
      if (rule.kind !== identity.kind) continue;
      if (rule.group !== undefined && rule.group !== identity.group) continue;
      if (rule.name !== undefined && rule.name !== identity.name) continue;
      if (rule.namespace !== undefined && rule.namespace !== identity.namespace) continue;
      paths.push(...rule.jsonPointers.map(parsePointer));
    }
    return paths;
  }
}

/**
 * True when `path` equals or lies below any ignored path
 */
export function isIgnored(path: readonly string[], ignored: readonly string[][]): boolean {
  return ignored.some(prefix =>
    prefix.length <= path.length && prefix.every((token, index) => path[index] === token)
  );
}
