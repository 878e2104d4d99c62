/**
 * Coding conventions the checks consult about project-specific idioms.
 */
import type { Node } from '@babel/types';
import { getQualifiedName } from './qualifiedName.js';

export interface CodingConvention {
  /**
   * Whether `callee` is a helper whose string-literal argument names a
   * property that must survive renaming, e.g.
   * `JSCompiler_renameProperty('count_', obj)`.
   */
  isPropertyRenameFunction(callee: Node): boolean;
}

export const DEFAULT_PROPERTY_RENAME_FUNCTIONS: readonly string[] = [
  'JSCompiler_renameProperty',
  'goog.reflect.objectProperty',
];

/**
 * Convention matching callees by qualified name against the built-in
 * rename helpers plus any configured ones.
 */
export class DefaultCodingConvention implements CodingConvention {
  private readonly renameFunctions: ReadonlySet<string>;

  constructor(extraRenameFunctions: readonly string[] = []) {
    this.renameFunctions = new Set([...DEFAULT_PROPERTY_RENAME_FUNCTIONS, ...extraRenameFunctions]);
  }

  isPropertyRenameFunction(callee: Node): boolean {
    const name = getQualifiedName(callee);
    return name !== undefined && this.renameFunctions.has(name);
  }
}
