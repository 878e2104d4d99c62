/**
 * DiagnosticReporter - Formats diagnostics for output
 *
 * Supports multiple output formats:
 * - text: one line per diagnostic, `[WARN] CODE (file:line:column) message`
 * - json: machine-readable JSON for CI integration
 * - csv: spreadsheet-compatible format
 *
 * Usage:
 *   const reporter = new DiagnosticReporter(collector);
 *   console.log(reporter.report({ format: 'text', includeSummary: true }));
 */

import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';

/**
 * Report output options
 */
export interface ReportOptions {
  format: 'text' | 'json' | 'csv';
  includeSummary?: boolean;
}

/**
 * Summary statistics
 */
export interface SummaryStats {
  total: number;
  errors: number;
  warnings: number;
  files: number;
}

/**
 * Diagnostic as it appears in JSON output
 */
type ReportedDiagnostic = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticReporter {
  constructor(private collector: DiagnosticCollector) {}

  /**
   * Generate a formatted report of all diagnostics.
   */
  report(options: ReportOptions): string {
    const diagnostics = this.collector.getAll();

    switch (options.format) {
      case 'json':
        return this.jsonReport(diagnostics, options);
      case 'csv':
        return this.csvReport(diagnostics);
      case 'text':
        return this.textReport(diagnostics, options);
    }
  }

  /**
   * Human-readable summary of diagnostic counts.
   */
  summary(): string {
    const stats = this.getStats();

    if (stats.total === 0) {
      return 'No issues found.';
    }

    const parts: string[] = [];
    if (stats.errors > 0) {
      parts.push(`Errors: ${stats.errors}`);
    }
    if (stats.warnings > 0) {
      parts.push(`Warnings: ${stats.warnings}`);
    }
    const fileWord = stats.files === 1 ? 'file' : 'files';
    return `${parts.join(', ')} (in ${stats.files} ${fileWord})`;
  }

  getStats(): SummaryStats {
    const diagnostics = this.collector.getAll();
    return {
      total: diagnostics.length,
      errors: diagnostics.filter(d => d.level === 'error').length,
      warnings: diagnostics.filter(d => d.level === 'warning').length,
      files: new Set(diagnostics.map(d => d.file)).size,
    };
  }

  private textReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    if (diagnostics.length === 0) {
      return 'No issues found.';
    }

    const lines = diagnostics.map(
      diag => `${this.getLevelIcon(diag.level)} ${diag.code} (${this.formatLocation(diag)}) ${diag.message}`
    );

    if (options.includeSummary) {
      lines.push('');
      lines.push(this.summary());
    }

    return lines.join('\n');
  }

  private jsonReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const result: {
      diagnostics: ReportedDiagnostic[];
      summary?: SummaryStats;
    } = {
      diagnostics: diagnostics.map(({ timestamp: _timestamp, ...rest }) => rest),
    };

    if (options.includeSummary) {
      result.summary = this.getStats();
    }

    return JSON.stringify(result, null, 2);
  }

  private csvReport(diagnostics: Diagnostic[]): string {
    const header = 'level,code,file,line,column,message,check';
    const rows = diagnostics.map(d =>
      [
        d.level,
        d.code,
        this.csvEscape(d.file),
        d.line,
        d.column,
        this.csvEscape(d.message),
        d.check,
      ].join(',')
    );
    return [header, ...rows].join('\n');
  }

  private getLevelIcon(level: Diagnostic['level']): string {
    return level === 'error' ? '[ERROR]' : '[WARN]';
  }

  private formatLocation(diag: Diagnostic): string {
    return `${diag.file}:${diag.line}:${diag.column}`;
  }

  /**
   * Wrap in quotes, doubling internal quotes.
   */
  private csvEscape(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }
}
