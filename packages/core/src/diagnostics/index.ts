/**
 * Diagnostics - finding collection and reporting
 *
 * - DiagnosticCollector: applies levels to findings from checks
 * - DiagnosticReporter: formats diagnostics for output (text/json/csv)
 * - types: single source of truth for diagnostic codes
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput, DiagnosticLevels } from './DiagnosticCollector.js';

export { DiagnosticReporter } from './DiagnosticReporter.js';
export type { ReportOptions, SummaryStats } from './DiagnosticReporter.js';

export {
  DIAGNOSTIC_TYPES,
  isDiagnosticCode,
  getDiagnosticType,
  formatDiagnosticMessage,
} from './types.js';
export type { DiagnosticType, DiagnosticCode } from './types.js';
