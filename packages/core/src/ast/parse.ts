/**
 * Source parsing for analyzer runs.
 *
 * TypeScript syntax is enabled only for .ts/.tsx/.mts/.cts files: with the
 * typescript plugin on, `<T>expr` is a type assertion and plain .js files
 * using JSX would stop parsing.
 */
import { parse, type ParserPlugin } from '@babel/parser';
import { extname } from 'path';

const TS_EXTENSIONS = new Set(['.ts', '.tsx', '.mts', '.cts']);
const JSX_EXTENSIONS = new Set(['.js', '.jsx', '.mjs', '.cjs', '.tsx']);

export const SOURCE_EXTENSIONS: readonly string[] = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'];

const COMMON_PLUGINS: ParserPlugin[] = [
  'classProperties',
  'classPrivateProperties',
  'classPrivateMethods',
  'exportDefaultFrom',
  'dynamicImport',
  'optionalChaining',
  'nullishCoalescingOperator',
  'topLevelAwait',
  'importMeta',
];

export function parserPluginsFor(file: string): ParserPlugin[] {
  const ext = extname(file).toLowerCase();
  const plugins: ParserPlugin[] = [...COMMON_PLUGINS];
  if (TS_EXTENSIONS.has(ext)) {
    plugins.push('typescript', 'decorators-legacy');
  } else {
    plugins.push('decorators-legacy');
  }
  if (JSX_EXTENSIONS.has(ext)) {
    plugins.push('jsx');
  }
  return plugins;
}

/**
 * Babel File plus the syntax errors the parser recovered from.
 */
export type ParsedSource = ReturnType<typeof parse>;

/**
 * Parse source text into a Babel File. Comments stay attached to nodes;
 * the visibility resolver reads them.
 *
 * Throws the parser's SyntaxError for source it cannot recover from.
 * Errors it recovers from are left in `errors`.
 */
export function parseSource(code: string, file: string): ParsedSource {
  return parse(code, {
    sourceType: 'unambiguous',
    sourceFilename: file,
    plugins: parserPluginsFor(file),
    errorRecovery: true,
  });
}
