/**
 * Diagnostic Types - findings emitted by checks and the levels they are shown at
 */

/**
 * Level a diagnostic code is reported at. `off` drops the finding.
 */
export type DiagnosticLevel = 'off' | 'warning' | 'error';

export const DIAGNOSTIC_LEVELS: readonly DiagnosticLevel[] = ['off', 'warning', 'error'];

/**
 * Raw finding as a check emits it, before a level is applied.
 */
export interface Finding {
  code: string;
  message: string;
  file: string;
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
  /** Values substituted into the diagnostic template */
  args: string[];
}
