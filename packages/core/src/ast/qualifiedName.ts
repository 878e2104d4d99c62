/**
 * Best-effort dotted names for expressions and for the l-values that
 * functions and classes are bound to.
 *
 * Every resolver here returns undefined when no name can be given
 * (computed access, call results, anonymous classes); callers treat that as
 * "no information", never as an error.
 */
import type { NodePath } from '@babel/traverse';
import type { Node } from '@babel/types';

/**
 * Dotted name of a name or non-computed member chain.
 *
 * @example
 * // `a.b.c` => "a.b.c", `this.x` => "this.x", `a[b].c` => undefined
 */
export function getQualifiedName(node: Node): string | undefined {
  switch (node.type) {
    case 'Identifier':
      return node.name;
    case 'ThisExpression':
      return 'this';
    case 'Super':
      return 'super';
    case 'MemberExpression':
    case 'OptionalMemberExpression': {
      if (node.computed || node.property.type !== 'Identifier') {
        return undefined;
      }
      const owner = getQualifiedName(node.object);
      return owner === undefined ? undefined : `${owner}.${node.property.name}`;
    }
    default:
      return undefined;
  }
}

/**
 * Name of a non-computed object or class key.
 */
export function getObjectKeyName(key: Node): string | undefined {
  switch (key.type) {
    case 'Identifier':
      return key.name;
    case 'StringLiteral':
      return key.value;
    case 'NumericLiteral':
      return String(key.value);
    default:
      return undefined;
  }
}

function getOwnName(node: Node): string | undefined {
  switch (node.type) {
    case 'FunctionDeclaration':
    case 'FunctionExpression':
    case 'ClassDeclaration':
    case 'ClassExpression':
      return node.id?.name;
    default:
      return undefined;
  }
}

/**
 * Name a function or class is known by: the variable, assignment target or
 * object key it is bound to, else its own id.
 *
 * @example
 * // `ns.Foo = class {}` => "ns.Foo"
 * // `const ns = { Foo: function() {} }` => "ns.Foo"
 * // `class Foo {}` => "Foo"
 */
export function getBestLValueName(path: NodePath): string | undefined {
  const node = path.node;
  if (node.type === 'FunctionDeclaration' || node.type === 'ClassDeclaration') {
    return getOwnName(node);
  }
  return getBindingName(path) ?? getOwnName(node);
}

function getBindingName(path: NodePath): string | undefined {
  const parent = path.parentPath;
  if (parent === null) {
    return undefined;
  }

  const node = path.node;
  const parentNode = parent.node;
  switch (parentNode.type) {
    case 'VariableDeclarator':
      return parentNode.init === node ? getQualifiedName(parentNode.id) : undefined;
    case 'AssignmentExpression':
      return parentNode.right === node ? getQualifiedName(parentNode.left) : undefined;
    case 'ObjectProperty': {
      if (parentNode.value !== node || parentNode.computed) {
        return undefined;
      }
      const key = getObjectKeyName(parentNode.key);
      const literal = parent.parentPath;
      const owner = literal === null ? undefined : getBindingName(literal);
      return key === undefined || owner === undefined ? undefined : `${owner}.${key}`;
    }
    case 'ConditionalExpression':
      return parentNode.test === node ? undefined : getBindingName(parent);
    case 'LogicalExpression':
      return getBindingName(parent);
    case 'SequenceExpression': {
      const last = parentNode.expressions[parentNode.expressions.length - 1];
      return last === node ? getBindingName(parent) : undefined;
    }
    case 'TSAsExpression':
    case 'TSSatisfiesExpression':
    case 'TSNonNullExpression':
    case 'TypeCastExpression':
      return getBindingName(parent);
    default:
      return undefined;
  }
}
