/**
 * @babel/traverse ESM/CJS interop
 *
 * @babel/traverse is CommonJS. Imported from ESM its default export is the
 * module object, with the function under `.default`; under other loaders
 * the import is the function itself.
 *
 * Usage:
 *   import traverseModule from '@babel/traverse';
 *   const traverse = getTraverseFunction(traverseModule);
 */

import type { TraverseOptions, Scope, NodePath, Node } from '@babel/traverse';

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === 'function';
}

function getDefaultExport(mod: unknown): unknown {
  return typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
}

/**
 * @throws Error if no traverse function can be found on the module
 */
export function getTraverseFunction(traverseModule: unknown): TraverseFunction {
  const wrapped = getDefaultExport(traverseModule);
  if (isTraverseFunction(wrapped)) {
    return wrapped;
  }
  if (isTraverseFunction(traverseModule)) {
    return traverseModule;
  }
  throw new Error(
    'Unable to resolve @babel/traverse function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}
