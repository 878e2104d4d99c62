/**
 * Pass events - the node kinds the unused-private check reacts to.
 *
 * The traversal is turned into a closed union of events so the reconciler
 * can switch over it exhaustively. `file-enter` fires when a Program is
 * entered; every other event fires when its node is exited, after all of
 * its children.
 */
import type { NodePath } from '@babel/traverse';
import type {
  CallExpression,
  ClassMethod,
  ClassProperty,
  ObjectExpression,
  ObjectMethod,
  ObjectPattern,
  OptionalCallExpression,
  TSParameterProperty,
} from '@babel/types';
import { getObjectKeyName } from '../../ast/qualifiedName.js';
import { getPropertyName, isPropertyReference, type PropertyReferenceNode } from '../../ast/propertyReference.js';

export type PassEvent =
  | { kind: 'file-enter'; path: NodePath }
  | { kind: 'file-exit'; path: NodePath }
  | { kind: 'property-reference'; path: NodePath; node: PropertyReferenceNode; name: string }
  | { kind: 'method-declaration'; path: NodePath; node: ClassMethod | ObjectMethod; name: string }
  | { kind: 'field-declaration'; path: NodePath; node: ClassProperty | TSParameterProperty; name: string }
  | { kind: 'object-literal'; path: NodePath; keys: string[] }
  | { kind: 'object-pattern'; path: NodePath; keys: string[] }
  | { kind: 'call'; path: NodePath; node: CallExpression | OptionalCallExpression }
  | { kind: 'function'; path: NodePath }
  | { kind: 'class'; path: NodePath };

export function classifyEnter(path: NodePath): PassEvent | undefined {
  return path.node.type === 'Program' ? { kind: 'file-enter', path } : undefined;
}

export function classifyExit(path: NodePath): PassEvent | undefined {
  const node = path.node;
  switch (node.type) {
    case 'Program':
      return { kind: 'file-exit', path };
    case 'MemberExpression':
    case 'OptionalMemberExpression':
      return isPropertyReference(node)
        ? { kind: 'property-reference', path, node, name: node.property.name }
        : undefined;
    case 'ClassMethod':
      // Getters and setters are accessors, not methods
      return (node.kind === 'method' || node.kind === 'constructor') && hasStaticKey(node)
        ? { kind: 'method-declaration', path, node, name: getPropertyName(node) }
        : undefined;
    case 'ObjectMethod':
      return node.kind === 'method' && hasStaticKey(node)
        ? { kind: 'method-declaration', path, node, name: getPropertyName(node) }
        : undefined;
    case 'ClassProperty':
      return hasStaticKey(node)
        ? { kind: 'field-declaration', path, node, name: getPropertyName(node) }
        : undefined;
    case 'TSParameterProperty':
      return namesParameter(node)
        ? { kind: 'field-declaration', path, node, name: getPropertyName(node) }
        : undefined;
    case 'ObjectExpression':
      return { kind: 'object-literal', path, keys: objectLiteralKeys(node) };
    case 'ObjectPattern':
      return { kind: 'object-pattern', path, keys: objectPatternKeys(node) };
    case 'CallExpression':
    case 'OptionalCallExpression':
      return { kind: 'call', path, node };
    case 'FunctionDeclaration':
    case 'FunctionExpression':
      return { kind: 'function', path };
    case 'ClassDeclaration':
    case 'ClassExpression':
      return { kind: 'class', path };
    default:
      return undefined;
  }
}

function hasStaticKey(node: ClassMethod | ObjectMethod | ClassProperty): boolean {
  return !node.computed && getObjectKeyName(node.key) !== undefined;
}

/**
 * Keys an object literal defines. Any of them may reflect a class property,
 * so all count as reads. Spread and computed keys name nothing.
 */
function objectLiteralKeys(node: ObjectExpression): string[] {
  const keys: string[] = [];
  for (const property of node.properties) {
    if (property.type === 'SpreadElement' || property.computed) {
      continue;
    }
    const key = getObjectKeyName(property.key);
    if (key !== undefined) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Keys a destructuring pattern reads: `const { count_ } = this`.
 */
function objectPatternKeys(node: ObjectPattern): string[] {
  const keys: string[] = [];
  for (const property of node.properties) {
    if (property.type === 'RestElement' || property.computed) {
      continue;
    }
    const key = getObjectKeyName(property.key);
    if (key !== undefined) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * `private x` or `private x = 1`. Binding patterns are a syntax error the
 * parser may recover from; they declare no property.
 */
function namesParameter(node: TSParameterProperty): boolean {
  const param = node.parameter;
  return param.type === 'Identifier' || (param.type === 'AssignmentPattern' && param.left.type === 'Identifier');
}
