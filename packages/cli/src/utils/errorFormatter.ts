/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { PropsweepError } from '@propsweep/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Unknown diagnostic code: UNUSED_THING', [
 *   'Run: propsweep check --list-checks'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(formatError(title, nextSteps));
  process.exit(1);
}

export function formatError(title: string, nextSteps?: string[]): string {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines.join('\n');
}

/**
 * Title and next steps for an error thrown out of a command. propsweep
 * errors carry their own suggestion.
 */
export function describeError(error: unknown): { title: string; nextSteps?: string[] } {
  if (error instanceof PropsweepError) {
    return {
      title: error.message,
      nextSteps: error.suggestion === undefined ? undefined : [error.suggestion],
    };
  }
  return { title: error instanceof Error ? error.message : String(error) };
}
