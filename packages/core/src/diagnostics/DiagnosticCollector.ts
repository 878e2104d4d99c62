/**
 * DiagnosticCollector - Collects findings from checks and applies levels
 *
 * Findings arrive through FindingSink objects handed to each check. The
 * collector resolves the level for the finding's code (configured override,
 * else the code's default) and keeps the finding only if that level is not
 * `off`.
 *
 * Usage:
 *   const collector = new DiagnosticCollector({ UNUSED_PRIVATE_PROPERTY: 'warning' });
 *   check.begin({ ..., sink: collector.sinkFor('UnusedPrivatePropertyCheck') });
 *
 *   if (collector.hasErrors()) process.exitCode = 1;
 */

import type { DiagnosticLevel, Finding, FindingSink } from '@propsweep/types';
import { getDiagnosticType } from './types.js';

/**
 * Diagnostic entry - a finding with its resolved level
 */
export interface Diagnostic {
  code: string;
  level: Exclude<DiagnosticLevel, 'off'>;
  message: string;
  file: string;
  line: number;
  column: number;
  check: string;
  timestamp: number;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export type DiagnosticLevels = Readonly<Record<string, DiagnosticLevel>>;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];
  private dropped = 0;

  constructor(private readonly levels: DiagnosticLevels = {}) {}

  /**
   * Level a code is reported at: configured override, else the code's
   * default, else warning for codes no table knows.
   */
  levelFor(code: string): DiagnosticLevel {
    return this.levels[code] ?? getDiagnosticType(code)?.defaultLevel ?? 'warning';
  }

  /**
   * Record a finding from a check. Returns false when the code is off.
   */
  report(finding: Finding, check: string): boolean {
    const level = this.levelFor(finding.code);
    if (level === 'off') {
      this.dropped++;
      return false;
    }
    this.add({
      code: finding.code,
      level,
      message: finding.message,
      file: finding.file,
      line: finding.line,
      column: finding.column,
      check,
    });
    return true;
  }

  /**
   * Sink that tags every finding with the emitting check's name.
   */
  sinkFor(check: string): FindingSink {
    return {
      report: (finding: Finding): void => {
        this.report(finding, check);
      },
    };
  }

  /**
   * Add a diagnostic directly. Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /**
   * All diagnostics, in the order they were reported. Returns a copy.
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  getByFile(file: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.file === file);
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.level === 'error');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.level === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Number of findings discarded because their code was off.
   */
  droppedCount(): number {
    return this.dropped;
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
    this.dropped = 0;
  }
}
