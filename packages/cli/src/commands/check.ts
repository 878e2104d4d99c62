/**
 * Check command - Report unused private properties
 *
 * Analyzes the project (or the given files and directories) and prints the
 * findings whose diagnostic level is not `off`. Every diagnostic is off by
 * default; enable codes with -w/-e or in .propsweep/config.yaml.
 *
 * Exit status is 1 when any finding is at error level.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import {
  Analyzer,
  ConfigError,
  ConsoleLogger,
  DiagnosticReporter,
  closeLogger,
  createDefaultChecks,
  createLogger,
  getDiagnosticType,
  isDiagnosticCode,
  loadConfig,
  validateRegistryScope,
  type AnalysisResult,
  type PropsweepConfig,
} from '@propsweep/core';
import { LOG_LEVELS, type DiagnosticLevel, type LogLevel } from '@propsweep/types';
import { describeError, exitWithError } from '../utils/errorFormatter.js';

export interface CheckOptions {
  project: string;
  warning?: string[];
  error?: string[];
  registryScope?: string;
  json?: boolean;
  quiet?: boolean;
  logLevel?: string;
  logFile?: string;
  listChecks?: boolean;
}

export interface CheckOutcome {
  exitCode: number;
  /** Text for stdout; empty when there is nothing to print */
  output: string;
  result?: AnalysisResult;
}

export const checkCommand = new Command('check')
  .description('Report private properties and methods that are never read')
  .argument('[paths...]', 'Files or directories to check (default: the whole project)')
  .option('-p, --project <path>', 'Project path (where .propsweep/config.yaml lives)', '.')
  .option('-w, --warning <codes...>', 'Report these diagnostic codes as warnings')
  .option('-e, --error <codes...>', 'Report these diagnostic codes as errors')
  .option('--registry-scope <scope>', 'per-file or whole-compilation')
  .option('-j, --json', 'Output results as JSON')
  .option('-q, --quiet', 'Only output findings')
  .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`)
  .option('--log-file <path>', 'Write a debug log to this file')
  .option('--list-checks', 'List available checks and their diagnostic codes')
  .addHelpText('after', `
Examples:
  propsweep check -w UNUSED_PRIVATE_PROPERTY          Warn on unused privates
  propsweep check -e UNUSED_PRIVATE_PROPERTY src      Fail CI on unused privates in src/
  propsweep check --registry-scope whole-compilation  Remember classes across files
  propsweep check --list-checks                       List checks
`)
  .action(async (paths: string[], options: CheckOptions) => {
    let outcome: CheckOutcome;
    try {
      outcome = await runCheck(paths, options);
    } catch (err) {
      const { title, nextSteps } = describeError(err);
      exitWithError(title, nextSteps);
    }
    if (outcome.output) {
      console.log(outcome.output);
    }
    process.exitCode = outcome.exitCode;
  });

/**
 * Run the check command without touching process state.
 *
 * @throws ConfigError for invalid options or configuration
 */
export async function runCheck(paths: readonly string[], options: CheckOptions): Promise<CheckOutcome> {
  if (options.listChecks) {
    return { exitCode: 0, output: listChecks() };
  }

  const projectPath = resolve(options.project);
  const config = loadConfig(projectPath, new ConsoleLogger('warnings', { stderrOnly: true }));
  const logLevel = resolveLogLevel(options, config);
  const logger = createLogger(logLevel, { logFile: options.logFile, stderrOnly: true });

  try {
    const analyzer = new Analyzer({
      config: {
        ...config,
        registryScope: validateRegistryScope(options.registryScope) ?? config.registryScope,
        diagnostics: applyLevelOverrides(config.diagnostics, options),
      },
      logger,
    });

    const result = paths.length > 0
      ? await analyzer.analyzeFiles(paths.map(path => resolve(path)), projectPath)
      : await analyzer.analyzeProject(projectPath);

    const reporter = new DiagnosticReporter(result.diagnostics);
    let output: string;
    if (options.json) {
      output = reporter.report({ format: 'json', includeSummary: true });
    } else if (options.quiet && result.diagnostics.count() === 0) {
      output = '';
    } else {
      output = reporter.report({ format: 'text', includeSummary: !options.quiet });
    }

    return { exitCode: result.diagnostics.hasErrors() ? 1 : 0, output, result };
  } finally {
    await closeLogger(logger);
  }
}

/**
 * Config levels with the -w/-e codes applied on top; -e wins over -w.
 */
export function applyLevelOverrides(
  levels: PropsweepConfig['diagnostics'],
  options: Pick<CheckOptions, 'warning' | 'error'>
): Record<string, DiagnosticLevel> {
  const result: Record<string, DiagnosticLevel> = { ...levels };
  for (const code of options.warning ?? []) {
    result[requireDiagnosticCode(code)] = 'warning';
  }
  for (const code of options.error ?? []) {
    result[requireDiagnosticCode(code)] = 'error';
  }
  return result;
}

function requireDiagnosticCode(code: string): string {
  if (!isDiagnosticCode(code)) {
    throw new ConfigError(
      `Unknown diagnostic code: ${code}`,
      'ERR_UNKNOWN_DIAGNOSTIC',
      {},
      'Run: propsweep check --list-checks'
    );
  }
  return code;
}

function resolveLogLevel(options: CheckOptions, config: PropsweepConfig): LogLevel {
  if (options.logLevel !== undefined) {
    const level = LOG_LEVELS.find(candidate => candidate === options.logLevel);
    if (level === undefined) {
      throw new ConfigError(
        `Invalid log level: ${options.logLevel}`,
        'ERR_CONFIG_INVALID',
        {},
        `Use one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    return level;
  }
  if (options.quiet) {
    return 'errors';
  }
  return config.logLevel ?? 'warnings';
}

export function listChecks(): string {
  const lines: string[] = ['Available checks:', ''];
  for (const check of createDefaultChecks()) {
    const { name, description, diagnostics } = check.metadata;
    lines.push(`  ${name}`);
    lines.push(`    ${description}`);
    for (const code of diagnostics) {
      const type = getDiagnosticType(code);
      lines.push(`    ${code} (default: ${type?.defaultLevel ?? 'warning'})`);
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}
