/**
 * Runtime Registry Tests
 * @module tests/runtime/registry
 */

import { describe, it, expect } from 'vitest';
import { UnknownDestinationError } from '../../src/errors/index.js';
import { InMemoryRuntime } from '../../src/runtime/in-memory-runtime.js';
import { RuntimeRegistry } from '../../src/runtime/registry.js';

describe('RuntimeRegistry', () => {
  const staging = new InMemoryRuntime({ name: 'staging' });
  const production = new InMemoryRuntime({ name: 'production' });

  it('should resolve by name, then server, then default', () => {
    const registry = new RuntimeRegistry()
      .register(staging)
      .register(production, { server: 'https://prod.example.com:6443' });

    expect(registry.resolve({ name: 'production' })).toBe(production);
    expect(registry.resolve({ server: 'https://prod.example.com:6443' })).toBe(production);
    expect(registry.resolve({})).toBe(staging);
  });

  it('should honor an explicit default', () => {
    const registry = new RuntimeRegistry()
      .register(staging)
      .register(production, { default: true });

    expect(registry.resolve({})).toBe(production);
    expect(registry.list()).toEqual([staging, production]);
  });

  it('should reject unknown destinations', () => {
    const registry = new RuntimeRegistry().register(staging);

    expect(() => registry.resolve({ name: 'qa' })).toThrow(UnknownDestinationError);
    expect(() => registry.resolve({ name: 'qa' })).toThrow("No runtime registered for destination 'qa'");
    expect(() => registry.resolve({ server: 'https://qa.example.com' })).toThrow(UnknownDestinationError);
  });

  it('should reject the default destination when nothing is registered', () => {
    expect(() => new RuntimeRegistry().resolve({})).toThrow(
      "No runtime registered for destination '<default>'"
    );
  });
});
