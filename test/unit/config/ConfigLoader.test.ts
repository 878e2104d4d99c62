/**
 * ConfigLoader Tests
 *
 * Tests:
 * - YAML config loading (valid, partial, invalid)
 * - JSON config loading (deprecated, valid)
 * - YAML takes precedence over JSON
 * - No config returns defaults
 * - Validation errors for bad values
 * - Logger injection for warning capture
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { loadConfig, DEFAULT_CONFIG, ConfigError } from '@propsweep/core';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Captures warnings from logger during test execution
 */
interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

// =============================================================================
// TESTS: ConfigLoader
// =============================================================================

describe('ConfigLoader', () => {
  const testDir = join(process.cwd(), 'test-fixtures', 'config-loader');
  const configDir = join(testDir, '.propsweep');

  beforeEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
    mkdirSync(configDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  describe('defaults', () => {
    it('should return defaults when no config file exists', () => {
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG);
      assert.strictEqual(logger.warnings.length, 0);
    });

    it('should use per-file registry scope and no level overrides by default', () => {
      assert.strictEqual(DEFAULT_CONFIG.registryScope, 'per-file');
      assert.deepStrictEqual(DEFAULT_CONFIG.diagnostics, {});
      assert.deepStrictEqual(DEFAULT_CONFIG.propertyRenameFunctions, []);
    });

    it('should treat an empty file as defaults', () => {
      writeFileSync(join(configDir, 'config.yaml'), '# nothing yet\n');
      const config = loadConfig(testDir, createLoggerMock());

      assert.strictEqual(config.registryScope, 'per-file');
      assert.deepStrictEqual(config.diagnostics, {});
      assert.strictEqual(config.include, undefined);
    });
  });

  describe('YAML config', () => {
    it('should load every field', () => {
      writeFileSync(
        join(configDir, 'config.yaml'),
        [
          'registryScope: whole-compilation',
          'diagnostics:',
          '  UNUSED_PRIVATE_PROPERTY: error',
          'propertyRenameFunctions:',
          '  - app.reflect.prop',
          'include:',
          '  - "src/**"',
          'exclude:',
          '  - "**/*.test.js"',
          'logLevel: debug',
        ].join('\n')
      );

      const config = loadConfig(testDir, createLoggerMock());

      assert.deepStrictEqual(config, {
        registryScope: 'whole-compilation',
        diagnostics: { UNUSED_PRIVATE_PROPERTY: 'error' },
        propertyRenameFunctions: ['app.reflect.prop'],
        include: ['src/**'],
        exclude: ['**/*.test.js'],
        logLevel: 'debug',
      });
    });

    it('should fill missing fields from defaults', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'diagnostics:\n  UNUSED_PRIVATE_PROPERTY: warning\n');
      const config = loadConfig(testDir, createLoggerMock());

      assert.strictEqual(config.registryScope, 'per-file');
      assert.deepStrictEqual(config.diagnostics, { UNUSED_PRIVATE_PROPERTY: 'warning' });
      assert.deepStrictEqual(config.propertyRenameFunctions, []);
    });

    it('should warn and fall back to defaults on a parse error', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'registryScope: [unclosed\n');
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG);
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith('Failed to parse config.yaml: '));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });

    it('should warn about an empty include list', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'include: []\n');
      const logger = createLoggerMock();
      loadConfig(testDir, logger);

      assert.deepStrictEqual(logger.warnings, ['Warning: include is an empty array - no files will be processed']);
    });
  });

  describe('validation', () => {
    function assertConfigError(yaml: string, message: string): void {
      writeFileSync(join(configDir, 'config.yaml'), yaml);
      assert.throws(
        () => loadConfig(testDir, createLoggerMock()),
        (err: unknown) => err instanceof ConfigError && err.message === message && err.code === 'ERR_CONFIG_INVALID'
      );
    }

    it('should reject an unknown registry scope', () => {
      assertConfigError(
        'registryScope: global\n',
        'Config error: registryScope must be one of per-file, whole-compilation, got "global"'
      );
    });

    it('should reject an unknown diagnostic code', () => {
      assertConfigError('diagnostics:\n  NOPE: error\n', 'Config error: diagnostics.NOPE is not a known diagnostic code');
    });

    it('should reject an unknown diagnostic level', () => {
      assertConfigError(
        'diagnostics:\n  UNUSED_PRIVATE_PROPERTY: loud\n',
        'Config error: diagnostics.UNUSED_PRIVATE_PROPERTY must be one of off, warning, error, got "loud"'
      );
    });

    it('should reject non-string list entries', () => {
      assertConfigError(
        'propertyRenameFunctions:\n  - 42\n',
        'Config error: propertyRenameFunctions[0] must be a string, got number'
      );
    });

    it('should reject whitespace-only patterns', () => {
      assertConfigError('exclude:\n  - "   "\n', 'Config error: exclude[0] cannot be empty or whitespace-only');
    });

    it('should reject a config that is not a mapping', () => {
      assertConfigError('- a\n- b\n', 'Config error: config must be a mapping, got array');
    });

    it('should reject an unknown log level', () => {
      assertConfigError(
        'logLevel: loud\n',
        'Config error: logLevel must be one of silent, errors, warnings, info, debug, got "loud"'
      );
    });
  });

  describe('JSON config (deprecated)', () => {
    it('should load config.json with a deprecation warning', () => {
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ registryScope: 'whole-compilation' }));
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config.registryScope, 'whole-compilation');
      assert.deepStrictEqual(logger.warnings, [
        'config.json is deprecated. Move its contents to .propsweep/config.yaml',
      ]);
    });

    it('should prefer config.yaml over config.json', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'registryScope: per-file\n');
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ registryScope: 'whole-compilation' }));
      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config.registryScope, 'per-file');
      assert.strictEqual(logger.warnings.length, 0);
    });
  });
});
