/**
 * Runtime Registry
 * @module runtime/registry
 *
 * Resolves Application destinations to target runtimes.
 */

import { UnknownDestinationError } from '../errors/index.js';
import type { Destination } from '../types/application.js';
import type { TargetRuntime } from './interface.js';

interface RegisteredRuntime {
  runtime: TargetRuntime;
  server?: string;
}

export class RuntimeRegistry {
  private readonly byName = new Map<string, RegisteredRuntime>();
  private defaultName: string | null = null;

  /**
   * Registers a runtime under a destination name and, optionally, a server URL.
   * The first runtime registered is the default for destinations naming neither.
   */
  register(runtime: TargetRuntime, options: { server?: string; default?: boolean } = {}): this {
    this.byName.set(runtime.name, { runtime, server: options.server });
    if (options.default || this.defaultName === null) {
      this.defaultName = runtime.name;
    }
    return this;
  }

  resolve(destination: Pick<Destination, 'server' | 'name'>): TargetRuntime {
    if (destination.name) {
      const entry = this.byName.get(destination.name);
      if (entry) return entry.runtime;
      throw new UnknownDestinationError(destination.name);
    }

    if (destination.server) {
      for (const entry of this.byName.values()) {
        if (entry.server === destination.server) return entry.runtime;
      }
      throw new UnknownDestinationError(destination.server);
    }

    const fallback = this.defaultName ? this.byName.get(this.defaultName) : undefined;
    if (!fallback) {
      throw new UnknownDestinationError('<default>');
    }
    return fallback.runtime;
  }

  list(): TargetRuntime[] {
    return [...this.byName.values()].map(entry => entry.runtime);
  }
}
