/**
 * Analyzer - runs checks over source files
 *
 * One call to analyzeSource/analyzeFiles/analyzeProject is one run: every
 * check gets a fresh session, so nothing a run learns leaks into the next.
 *
 * Files that fail to parse, including files the parser only recovered
 * from, are skipped and collected as LanguageErrors in `errors`. Invariant violations abort the run.
 */

import { readFile, stat } from 'fs/promises';
import { relative, resolve } from 'path';
import type { Logger } from '@propsweep/types';
import { parseSource, type ParsedSource } from './ast/parse.js';
import { DefaultCodingConvention } from './ast/CodingConvention.js';
import type { Check, CheckSession } from './checks/Check.js';
import { UnusedPrivatePropertyCheck } from './checks/unused-private/UnusedPrivatePropertyCheck.js';
import { DEFAULT_CONFIG, type PropsweepConfig } from './config/ConfigLoader.js';
import { DiagnosticCollector } from './diagnostics/DiagnosticCollector.js';
import { discoverSourceFiles } from './discovery/sourceFiles.js';
import { FileAccessError, LanguageError } from './errors/PropsweepError.js';
import { ConsoleLogger } from './logging/Logger.js';

export interface AnalyzerOptions {
  /** Overrides merged over DEFAULT_CONFIG */
  config?: Partial<PropsweepConfig>;
  logger?: Logger;
  /** Checks to run. Defaults to every built-in check. */
  checks?: Check[];
}

export interface SourceInput {
  /** Name findings are reported under */
  file: string;
  code: string;
}

export interface AnalysisResult {
  diagnostics: DiagnosticCollector;
  errors: Error[];
  filesAnalyzed: number;
}

export function createDefaultChecks(): Check[] {
  return [new UnusedPrivatePropertyCheck()];
}

export class Analyzer {
  readonly config: PropsweepConfig;
  private readonly logger: Logger;
  private readonly checks: Check[];

  constructor(options: AnalyzerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger ?? new ConsoleLogger('warnings');
    this.checks = options.checks ?? createDefaultChecks();
  }

  /**
   * Analyze one in-memory source.
   */
  analyzeSource(code: string, file: string = 'input.js'): AnalysisResult {
    return this.analyzeSources([{ file, code }]);
  }

  /**
   * Analyze in-memory sources as one run, in the order given.
   */
  analyzeSources(sources: readonly SourceInput[]): AnalysisResult {
    const run = this.startRun();
    for (const source of sources) {
      run.analyze(source);
    }
    return run.finish();
  }

  /**
   * Analyze files and directories. Directories are walked like a project;
   * files are taken as given. Findings name files relative to `root`.
   */
  async analyzeFiles(paths: readonly string[], root: string = process.cwd()): Promise<AnalysisResult> {
    const run = this.startRun();
    const files = await this.expandPaths(paths, root, run.errors);

    this.logger.info('Analyzing files', { count: files.length });
    for (const file of files) {
      let code: string;
      try {
        code = await readFile(file, 'utf-8');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        run.errors.push(new FileAccessError(
          `Cannot read ${file}: ${message}`,
          'ERR_FILE_UNREADABLE',
          { filePath: file },
          'Check file permissions'
        ));
        this.logger.warn('Skipping unreadable file', { file, error: message });
        continue;
      }
      run.analyze({ file: relative(root, file) || file, code });
    }
    return run.finish();
  }

  /**
   * Analyze every selected source file under a project directory.
   *
   * @throws FileAccessError if the project directory does not exist
   */
  async analyzeProject(projectPath: string): Promise<AnalysisResult> {
    const root = resolve(projectPath);
    if (!(await isDirectory(root))) {
      throw new FileAccessError(
        `Project directory not found: ${root}`,
        'ERR_PATH_NOT_FOUND',
        { filePath: root },
        'Pass an existing directory with --project'
      );
    }
    return this.analyzeFiles([root], root);
  }

  private async expandPaths(paths: readonly string[], root: string, errors: Error[]): Promise<string[]> {
    const files: string[] = [];
    const filter = { include: this.config.include, exclude: this.config.exclude };

    for (const path of paths) {
      const absolute = resolve(path);
      if (await isDirectory(absolute)) {
        files.push(...discoverSourceFiles(absolute, filter, root));
      } else if (await exists(absolute)) {
        files.push(absolute);
      } else {
        errors.push(new FileAccessError(
          `Path not found: ${path}`,
          'ERR_PATH_NOT_FOUND',
          { filePath: absolute }
        ));
        this.logger.warn('Path not found', { path });
      }
    }
    return files;
  }

  private startRun(): AnalysisRun {
    const diagnostics = new DiagnosticCollector(this.config.diagnostics);
    const convention = new DefaultCodingConvention(this.config.propertyRenameFunctions);
    const sessions = this.checks.map(check =>
      check.begin({
        sink: diagnostics.sinkFor(check.metadata.name),
        convention,
        registryScope: this.config.registryScope,
        logger: this.logger,
      })
    );
    return new AnalysisRun(sessions, diagnostics, this.logger);
  }
}

/**
 * State of one run: the check sessions, the collector and the tallies.
 */
class AnalysisRun {
  readonly errors: Error[] = [];
  private filesAnalyzed = 0;

  constructor(
    private readonly sessions: readonly CheckSession[],
    private readonly diagnostics: DiagnosticCollector,
    private readonly logger: Logger
  ) {}

  analyze(source: SourceInput): void {
    const ast = this.parse(source);
    if (ast === undefined) {
      return;
    }
    for (const session of this.sessions) {
      session.checkFile(ast, source.file);
    }
    this.filesAnalyzed++;
    this.logger.debug('Analyzed file', { file: source.file });
  }

  finish(): AnalysisResult {
    this.logger.info('Analysis complete', {
      files: this.filesAnalyzed,
      diagnostics: this.diagnostics.count(),
      suppressed: this.diagnostics.droppedCount(),
      errors: this.errors.length,
    });
    return { diagnostics: this.diagnostics, errors: this.errors, filesAnalyzed: this.filesAnalyzed };
  }

  private parse(source: SourceInput): ParsedSource | undefined {
    let ast: ParsedSource;
    try {
      ast = parseSource(source.code, source.file);
    } catch (err) {
      this.parseFailed(source.file, err instanceof Error ? err.message : String(err));
      return undefined;
    }

    const [recovered] = ast.errors;
    if (recovered !== undefined) {
      this.parseFailed(source.file, describeRecoveredError(recovered));
      return undefined;
    }
    return ast;
  }

  private parseFailed(file: string, message: string): void {
    this.errors.push(new LanguageError(
      `Failed to parse ${file}: ${message}`,
      'ERR_PARSE_FAILURE',
      { filePath: file },
      'Fix the syntax error or exclude the file'
    ));
    this.logger.warn('Skipping file that failed to parse', { file, error: message });
  }
}

function describeRecoveredError(error: { reasonCode: string }): string {
  return error instanceof Error ? error.message : error.reasonCode;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
