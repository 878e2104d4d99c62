/**
 * @propsweep/core - Analysis engine for propsweep
 */

// Error types
export {
  PropsweepError,
  ConfigError,
  FileAccessError,
  LanguageError,
  InvariantViolationError,
} from './errors/PropsweepError.js';
export type { ErrorContext, ErrorSeverity, PropsweepErrorJSON } from './errors/PropsweepError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, closeLogger } from './logging/Logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions, CreateLoggerOptions } from './logging/Logger.js';

// Diagnostics
export {
  DiagnosticCollector,
  DiagnosticReporter,
  DIAGNOSTIC_TYPES,
  isDiagnosticCode,
  getDiagnosticType,
  formatDiagnosticMessage,
} from './diagnostics/index.js';
export type {
  Diagnostic,
  DiagnosticInput,
  DiagnosticLevels,
  DiagnosticType,
  DiagnosticCode,
  ReportOptions,
  SummaryStats,
} from './diagnostics/index.js';

// Config
export {
  loadConfig,
  validateConfig,
  validateRegistryScope,
  validateDiagnosticLevel,
  DEFAULT_CONFIG,
  CONFIG_DIR,
} from './config/index.js';
export type { PropsweepConfig } from './config/index.js';

// Analyzer
export { Analyzer, createDefaultChecks } from './Analyzer.js';
export type { AnalyzerOptions, AnalysisResult, SourceInput } from './Analyzer.js';
export { discoverSourceFiles, isSourceFile, isSelected, matchesPattern } from './discovery/sourceFiles.js';
export type { DiscoveryFilter } from './discovery/sourceFiles.js';

// Check base
export { Check } from './checks/Check.js';
export type { CheckContext, CheckSession } from './checks/Check.js';

// Checks
export * from './checks/unused-private/index.js';

// AST utilities
export * from './ast/index.js';

// Version
export { PROPSWEEP_VERSION } from './version.js';
