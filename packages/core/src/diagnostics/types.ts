/**
 * Diagnostic Types - Single source of truth for diagnostic codes
 *
 * Every code a check can emit is declared here once, with its message
 * template and the level it is reported at when configuration says nothing.
 * Adding a new diagnostic requires updating only this table.
 */

import type { DiagnosticLevel } from '@propsweep/types';

/**
 * Diagnostic definition
 */
export interface DiagnosticType {
  readonly code: string;
  /** Check that emits this code */
  readonly check: string;
  /** Message template; `{0}`, `{1}`, ... are replaced by finding args */
  readonly template: string;
  readonly defaultLevel: DiagnosticLevel;
  readonly description: string;
}

export type DiagnosticCode = 'UNUSED_PRIVATE_PROPERTY';

/**
 * Canonical definition of all diagnostics
 */
export const DIAGNOSTIC_TYPES: Record<DiagnosticCode, DiagnosticType> = {
  UNUSED_PRIVATE_PROPERTY: {
    code: 'UNUSED_PRIVATE_PROPERTY',
    check: 'UnusedPrivatePropertyCheck',
    template: 'Private property {0} is never read',
    // Noisy on code that is only partially annotated; callers opt in.
    defaultLevel: 'off',
    description: 'Private properties and methods that nothing in their file reads',
  },
};

export function isDiagnosticCode(value: string): value is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_TYPES, value);
}

export function getDiagnosticType(code: string): DiagnosticType | undefined {
  return isDiagnosticCode(code) ? DIAGNOSTIC_TYPES[code] : undefined;
}

/**
 * Fill a template's numbered placeholders. Placeholders without an argument
 * are left as written.
 */
export function formatDiagnosticMessage(template: string, args: readonly string[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder: string, index: string) => args[Number(index)] ?? placeholder);
}
