import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import {
  DIAGNOSTIC_LEVELS,
  LOG_LEVELS,
  REGISTRY_SCOPES,
  type DiagnosticLevel,
  type LogLevel,
  type RegistryScope,
} from '@propsweep/types';
import { ConfigError } from '../errors/PropsweepError.js';
import { isDiagnosticCode } from '../diagnostics/types.js';

/**
 * propsweep configuration schema.
 *
 * Location: .propsweep/config.yaml (preferred) or .propsweep/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * # Forget registered classes at every file boundary (default) or keep
 * # them for the whole run
 * registryScope: per-file
 *
 * # Diagnostics are off unless enabled here or on the command line
 * diagnostics:
 *   UNUSED_PRIVATE_PROPERTY: warning
 *
 * # Extra helpers whose string argument names a property
 * propertyRenameFunctions:
 *   - app.reflect.prop
 *
 * include:
 *   - "src/**"
 * exclude:
 *   - "**\/*.test.js"
 * ```
 */
export interface PropsweepConfig {
  registryScope: RegistryScope;

  /**
   * Level override per diagnostic code. Codes not listed use their default.
   */
  diagnostics: Record<string, DiagnosticLevel>;

  /**
   * Qualified names of property-rename helpers, in addition to the
   * coding convention's built-in ones.
   */
  propertyRenameFunctions: string[];

  /**
   * Glob patterns (relative to the project root) a file must match.
   * Undefined means every source file.
   */
  include?: string[];

  /**
   * Glob patterns (relative to the project root) that exclude a file.
   */
  exclude?: string[];

  /** Console log level; the CLI flag wins over this. */
  logLevel?: LogLevel;
}

export const CONFIG_DIR = '.propsweep';

export const DEFAULT_CONFIG: PropsweepConfig = {
  registryScope: 'per-file',
  diagnostics: {},
  propertyRenameFunctions: [],
};

type RawConfig = Record<string, unknown>;

/**
 * Load propsweep config from project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * A file that does not parse is reported through the logger and the defaults
 * are used. A file that parses but holds invalid values throws ConfigError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Optional logger for warnings (defaults to console)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): PropsweepConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  if (existsSync(yamlPath)) {
    const raw = readConfigFile(yamlPath, 'config.yaml', content => parseYAML(content), logger);
    return raw === undefined ? DEFAULT_CONFIG : validateConfig(raw, yamlPath, logger);
  }

  if (existsSync(jsonPath)) {
    logger.warn('config.json is deprecated. Move its contents to .propsweep/config.yaml');
    const raw = readConfigFile(jsonPath, 'config.json', content => JSON.parse(content), logger);
    return raw === undefined ? DEFAULT_CONFIG : validateConfig(raw, jsonPath, logger);
  }

  return DEFAULT_CONFIG;
}

/**
 * Read and parse a config file. Returns undefined (after warning) when the
 * text does not parse.
 */
function readConfigFile(
  path: string,
  label: string,
  parse: (content: string) => unknown,
  logger: { warn: (msg: string) => void }
): RawConfig | undefined {
  let parsed: unknown;
  try {
    parsed = parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${label}: ${error.message}`);
    logger.warn('Using default configuration');
    return undefined;
  }

  // Empty file or comments only
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw invalid(`config must be a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`, path);
  }
  return parsed;
}

function isMapping(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed config values and merge them over the defaults.
 * THROWS ConfigError on invalid values.
 */
export function validateConfig(
  raw: RawConfig,
  filePath: string,
  logger: { warn: (msg: string) => void } = console
): PropsweepConfig {
  const registryScope = validateRegistryScope(raw.registryScope, filePath);
  const diagnostics = validateDiagnostics(raw.diagnostics, filePath);
  const propertyRenameFunctions = validateStringList(raw.propertyRenameFunctions, 'propertyRenameFunctions', filePath);
  const include = validateStringList(raw.include, 'include', filePath);
  const exclude = validateStringList(raw.exclude, 'exclude', filePath);
  const logLevel = validateLogLevel(raw.logLevel, filePath);

  if (include !== undefined && include.length === 0) {
    logger.warn('Warning: include is an empty array - no files will be processed');
  }

  return {
    registryScope: registryScope ?? DEFAULT_CONFIG.registryScope,
    diagnostics: diagnostics ?? DEFAULT_CONFIG.diagnostics,
    propertyRenameFunctions: propertyRenameFunctions ?? DEFAULT_CONFIG.propertyRenameFunctions,
    include,
    exclude,
    logLevel,
  };
}

export function validateRegistryScope(value: unknown, filePath?: string): RegistryScope | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const scope = REGISTRY_SCOPES.find(candidate => candidate === value);
  if (scope === undefined) {
    throw invalid(
      `registryScope must be one of ${REGISTRY_SCOPES.join(', ')}, got ${JSON.stringify(value)}`,
      filePath
    );
  }
  return scope;
}

export function validateDiagnosticLevel(value: unknown, where: string, filePath?: string): DiagnosticLevel {
  const level = DIAGNOSTIC_LEVELS.find(candidate => candidate === value);
  if (level === undefined) {
    throw invalid(`${where} must be one of ${DIAGNOSTIC_LEVELS.join(', ')}, got ${JSON.stringify(value)}`, filePath);
  }
  return level;
}

function validateDiagnostics(value: unknown, filePath: string): Record<string, DiagnosticLevel> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isMapping(value)) {
    throw invalid(`diagnostics must be a mapping of code to level, got ${typeof value}`, filePath);
  }

  const levels: Record<string, DiagnosticLevel> = {};
  for (const [code, level] of Object.entries(value)) {
    if (!isDiagnosticCode(code)) {
      throw invalid(`diagnostics.${code} is not a known diagnostic code`, filePath);
    }
    levels[code] = validateDiagnosticLevel(level, `diagnostics.${code}`, filePath);
  }
  return levels;
}

function validateStringList(value: unknown, field: string, filePath: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(`${field} must be an array, got ${typeof value}`, filePath);
  }

  const items: string[] = [];
  value.forEach((item: unknown, i: number) => {
    if (typeof item !== 'string') {
      throw invalid(`${field}[${i}] must be a string, got ${typeof item}`, filePath);
    }
    if (!item.trim()) {
      throw invalid(`${field}[${i}] cannot be empty or whitespace-only`, filePath);
    }
    items.push(item);
  });
  return items;
}

function validateLogLevel(value: unknown, filePath: string): LogLevel | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (level === undefined) {
    throw invalid(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(value)}`, filePath);
  }
  return level;
}

function invalid(message: string, filePath?: string): ConfigError {
  return new ConfigError(
    `Config error: ${message}`,
    'ERR_CONFIG_INVALID',
    filePath === undefined ? {} : { filePath },
    `Fix ${CONFIG_DIR}/config.yaml or remove the offending key`
  );
}
