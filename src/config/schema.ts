/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for the controller configuration. Types are inferred from
 * the schemas so defaults and validation live in one place.
 */

import { z } from 'zod';
import { OwnershipPolicy } from '../applications/ownership.js';

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  /** HMAC secret for `x-driftguard-signature` on webhook calls */
  webhookSecret: z.string().min(1).optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  /** Pretty-print through pino-pretty (ignored in production) */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Controller Configuration
// ============================================================================

export const RetryConfigSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(20).default(3),
  delayMs: z.coerce.number().int().min(0).default(500),
  backoffMultiplier: z.coerce.number().min(1).default(2),
  maxDelayMs: z.coerce.number().int().min(0).default(30000),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const WatchConfigSchema = z.object({
  /** Stream live changes for self-healing Applications */
  enabled: z.boolean().default(true),
  restartDelayMs: z.coerce.number().int().min(10).default(1000),
});

export type WatchConfig = z.infer<typeof WatchConfigSchema>;

export const ControllerConfigSchema = z.object({
  /** Namespace holding Application objects */
  namespace: z.string().min(1).default('driftguard'),
  pollIntervalMs: z.coerce.number().int().min(100).default(180000),
  /** Operations in flight per dependency tier */
  syncConcurrency: z.coerce.number().int().min(1).max(64).default(4),
  ownershipPolicy: z.nativeEnum(OwnershipPolicy).default(OwnershipPolicy.FIRST_WRITER_WINS),
  /** Manifest files declaring the root Applications */
  rootApplications: z.array(z.string().min(1)).default([]),
  retry: RetryConfigSchema.default({}),
  watch: WatchConfigSchema.default({}),
});

export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;

// ============================================================================
// Source Configuration
// ============================================================================

export const SourceConfigSchema = z.object({
  /** Git clones and checkouts */
  workDir: z.string().min(1).default('.driftguard/sources'),
  gitBinary: z.string().min(1).default('git'),
  fetchTimeoutMs: z.coerce.number().int().min(1000).default(60000),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

// ============================================================================
// Runtime Configuration
// ============================================================================

export const RuntimeConfigSchema = z.object({
  type: z.enum(['kubernetes', 'memory']).default('kubernetes'),
  /** Destination name the runtime answers to */
  name: z.string().min(1).default('in-cluster'),
  server: z.string().optional(),
  kubeconfig: z.string().optional(),
  context: z.string().optional(),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

// ============================================================================
// History Configuration
// ============================================================================

export const HistoryConfigSchema = z.object({
  store: z.enum(['memory', 'postgres']).default('memory'),
  databaseUrl: z.string().url().optional(),
  maxRunsPerApplication: z.coerce.number().int().min(1).max(10000).default(50),
});

export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;

// ============================================================================
// Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  controller: ControllerConfigSchema.default({}),
  source: SourceConfigSchema.default({}),
  runtime: RuntimeConfigSchema.default({}),
  history: HistoryConfigSchema.default({}),
}).superRefine((config, ctx) => {
  if (config.history.store === 'postgres' && !config.history.databaseUrl) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['history', 'databaseUrl'],
      message: 'databaseUrl is required when history.store is postgres',
    });
  }
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
