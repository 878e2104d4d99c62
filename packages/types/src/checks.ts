/**
 * Check Types - types shared by the analyzer and the checks it runs
 */

import type { Finding } from './diagnostics.js';

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * Checks should use context.logger instead of console.log for controllable output.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

// === REGISTRY SCOPE ===
/**
 * How long a check remembers the classes and interfaces it has seen.
 *
 * - per-file: forgotten at the start of every file
 * - whole-compilation: kept for every file of one analyzer run
 */
export type RegistryScope = 'per-file' | 'whole-compilation';

export const REGISTRY_SCOPES: readonly RegistryScope[] = ['per-file', 'whole-compilation'];

// === CHECK METADATA ===
export interface CheckMetadata {
  name: string;
  description: string;
  /** Diagnostic codes this check may emit */
  diagnostics: string[];
}

// === FINDING SINK ===
/**
 * Receives findings from a check. Whether a finding is shown is decided by
 * the sink (diagnostic levels), never by the check.
 */
export interface FindingSink {
  report(finding: Finding): void;
}
