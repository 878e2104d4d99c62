/**
 * Analyzer Tests
 *
 * Tests:
 * - Diagnostic levels applied to check findings (off by default)
 * - Parse failures are collected and the run continues
 * - Project discovery (hidden dirs, node_modules, .d.ts, include/exclude)
 * - Repeated runs are independent
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import {
  Analyzer,
  ConsoleLogger,
  FileAccessError,
  LanguageError,
  discoverSourceFiles,
  isSourceFile,
  type AnalysisResult,
  type PropsweepConfig,
} from '@propsweep/core';

// =============================================================================
// Test Helpers
// =============================================================================

const CACHE_SOURCE = [
  '/** @constructor */',
  'function Cache() {',
  '  /** @private */',
  '  this.cache_ = {};',
  '}',
].join('\n');

const WARN_ON_UNUSED: Partial<PropsweepConfig> = { diagnostics: { UNUSED_PRIVATE_PROPERTY: 'warning' } };

function createAnalyzer(config: Partial<PropsweepConfig> = WARN_ON_UNUSED): Analyzer {
  return new Analyzer({ config, logger: new ConsoleLogger('silent') });
}

function locations(result: AnalysisResult): string[] {
  return result.diagnostics.getAll().map(d => `${d.file}:${d.line}:${d.column}`);
}

// =============================================================================
// TESTS: analyzeSource
// =============================================================================

describe('Analyzer', () => {
  describe('analyzeSource', () => {
    it('should drop findings while the diagnostic is off', () => {
      const result = new Analyzer({ logger: new ConsoleLogger('silent') }).analyzeSource(CACHE_SOURCE);

      assert.strictEqual(result.diagnostics.count(), 0);
      assert.strictEqual(result.diagnostics.droppedCount(), 1);
      assert.strictEqual(result.filesAnalyzed, 1);
    });

    it('should report findings at the configured level', () => {
      const result = createAnalyzer().analyzeSource(CACHE_SOURCE, 'cache.js');
      const [diagnostic] = result.diagnostics.getAll();

      assert.strictEqual(result.diagnostics.count(), 1);
      assert.strictEqual(diagnostic.code, 'UNUSED_PRIVATE_PROPERTY');
      assert.strictEqual(diagnostic.level, 'warning');
      assert.strictEqual(diagnostic.message, 'Private property cache_ is never read');
      assert.strictEqual(diagnostic.check, 'UnusedPrivatePropertyCheck');
      assert.deepStrictEqual(locations(result), ['cache.js:4:3']);
    });

    it('should report errors at error level', () => {
      const result = createAnalyzer({ diagnostics: { UNUSED_PRIVATE_PROPERTY: 'error' } }).analyzeSource(CACHE_SOURCE);
      assert.strictEqual(result.diagnostics.hasErrors(), true);
    });

    it('should use configured rename helpers', () => {
      const source = `${CACHE_SOURCE}\nmyapp.keep('cache_');`;
      const result = createAnalyzer({ ...WARN_ON_UNUSED, propertyRenameFunctions: ['myapp.keep'] }).analyzeSource(source);
      assert.strictEqual(result.diagnostics.count(), 0);
    });

    it('should give the same findings on every run', () => {
      const analyzer = createAnalyzer({ ...WARN_ON_UNUSED, registryScope: 'whole-compilation' });
      const sources = [
        { file: 'foo.js', code: '/** @constructor */\nfunction Foo() {}' },
        { file: 'bar.js', code: '/** @private */\nFoo.bar = 1;' },
      ];

      const first = locations(analyzer.analyzeSources(sources));
      const second = locations(analyzer.analyzeSources(sources));

      assert.deepStrictEqual(first, ['bar.js:2:1']);
      assert.deepStrictEqual(second, first);
    });
  });

  describe('parse failures', () => {
    it('should collect a LanguageError and keep going', () => {
      const result = createAnalyzer().analyzeSources([
        { file: 'bad.js', code: '}' },
        { file: 'cache.js', code: CACHE_SOURCE },
      ]);

      assert.strictEqual(result.errors.length, 1);
      const [error] = result.errors;
      assert.ok(error instanceof LanguageError);
      assert.strictEqual(error.code, 'ERR_PARSE_FAILURE');
      assert.strictEqual(error.context.filePath, 'bad.js');
      assert.strictEqual(result.filesAnalyzed, 1);
      assert.deepStrictEqual(locations(result), ['cache.js:4:3']);
    });

    it('should keep going past a binding-pattern parameter property', () => {
      const result = createAnalyzer().analyzeSources([
        { file: 'a.ts', code: 'class A { constructor(private {a}: any) {} }' },
        { file: 'cache.js', code: CACHE_SOURCE },
      ]);

      assert.strictEqual(result.errors.length, 1);
      const [error] = result.errors;
      assert.ok(error instanceof LanguageError);
      assert.strictEqual(error.context.filePath, 'a.ts');
      assert.strictEqual(result.filesAnalyzed, 1);
      assert.deepStrictEqual(locations(result), ['cache.js:4:3']);
    });

    it('should skip files the parser only recovered from', () => {
      const result = createAnalyzer().analyzeSource(`let a;\nlet a;\n${CACHE_SOURCE}`, 'dup.js');

      assert.strictEqual(result.errors.length, 1);
      const [error] = result.errors;
      assert.ok(error instanceof LanguageError);
      assert.strictEqual(error.code, 'ERR_PARSE_FAILURE');
      assert.strictEqual(error.context.filePath, 'dup.js');
      assert.strictEqual(result.filesAnalyzed, 0);
      assert.strictEqual(result.diagnostics.count(), 0);
    });
  });

  // ===========================================================================
  // TESTS: projects
  // ===========================================================================

  describe('projects', () => {
    const root = join(process.cwd(), 'test-fixtures', 'analyzer');

    before(() => {
      if (existsSync(root)) {
        rmSync(root, { recursive: true });
      }
      for (const dir of ['src', 'node_modules/dep', '.hidden']) {
        mkdirSync(join(root, dir), { recursive: true });
      }
      writeFileSync(join(root, 'src', 'cache.js'), CACHE_SOURCE);
      writeFileSync(join(root, 'src', 'cache.test.js'), CACHE_SOURCE);
      writeFileSync(join(root, 'node_modules', 'dep', 'index.js'), CACHE_SOURCE);
      writeFileSync(join(root, '.hidden', 'cache.js'), CACHE_SOURCE);
      writeFileSync(join(root, 'types.d.ts'), 'declare const x: number;\n');
      writeFileSync(join(root, 'README.md'), '# fixture\n');
    });

    after(() => {
      if (existsSync(root)) {
        rmSync(root, { recursive: true });
      }
    });

    it('should discover source files in sorted order', () => {
      assert.deepStrictEqual(discoverSourceFiles(root), [
        join(root, 'src', 'cache.js'),
        join(root, 'src', 'cache.test.js'),
      ]);
    });

    it('should recognise source extensions', () => {
      assert.strictEqual(isSourceFile('a.ts'), true);
      assert.strictEqual(isSourceFile('a.mjs'), true);
      assert.strictEqual(isSourceFile('a.d.ts'), false);
      assert.strictEqual(isSourceFile('a.md'), false);
    });

    it('should report paths relative to the project', async () => {
      const result = await createAnalyzer().analyzeProject(root);

      assert.strictEqual(result.filesAnalyzed, 2);
      assert.deepStrictEqual(locations(result), ['src/cache.js:4:3', 'src/cache.test.js:4:3']);
    });

    it('should apply exclude patterns', async () => {
      const result = await createAnalyzer({ ...WARN_ON_UNUSED, exclude: ['**/*.test.js'] }).analyzeProject(root);
      assert.deepStrictEqual(locations(result), ['src/cache.js:4:3']);
    });

    it('should apply include patterns', async () => {
      const result = await createAnalyzer({ ...WARN_ON_UNUSED, include: ['lib/**'] }).analyzeProject(root);
      assert.strictEqual(result.filesAnalyzed, 0);
    });

    it('should collect missing paths as errors', async () => {
      const result = await createAnalyzer().analyzeFiles([join(root, 'src', 'cache.js'), join(root, 'missing.js')], root);

      assert.strictEqual(result.filesAnalyzed, 1);
      assert.strictEqual(result.errors.length, 1);
      assert.ok(result.errors[0] instanceof FileAccessError);
    });

    it('should reject a missing project directory', async () => {
      await assert.rejects(createAnalyzer().analyzeProject(join(root, 'nope')), FileAccessError);
    });
  });
});
