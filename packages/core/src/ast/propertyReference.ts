import type { Identifier, MemberExpression, Node, OptionalMemberExpression } from '@babel/types';
import { InvariantViolationError } from '../errors/PropsweepError.js';
import { getObjectKeyName } from './qualifiedName.js';

/**
 * `target.name` with a plain identifier name. Computed access (`a['x']`) and
 * `#private` names are not property references.
 */
export type PropertyReferenceNode = (MemberExpression | OptionalMemberExpression) & {
  computed: false;
  property: Identifier;
};

export function isPropertyReference(node: Node): node is PropertyReferenceNode {
  return (
    (node.type === 'MemberExpression' || node.type === 'OptionalMemberExpression') &&
    !node.computed &&
    node.property.type === 'Identifier'
  );
}

/**
 * Property name a reference or member declaration defines or reads.
 *
 * @throws InvariantViolationError for nodes that name no property
 */
export function getPropertyName(node: Node): string {
  switch (node.type) {
    case 'MemberExpression':
    case 'OptionalMemberExpression':
      if (isPropertyReference(node)) {
        return node.property.name;
      }
      break;
    case 'ClassMethod':
    case 'ObjectMethod':
    case 'ClassProperty': {
      const name = node.computed ? undefined : getObjectKeyName(node.key);
      if (name !== undefined) {
        return name;
      }
      break;
    }
    case 'TSParameterProperty': {
      const param = node.parameter;
      if (param.type === 'Identifier') {
        return param.name;
      }
      if (param.type === 'AssignmentPattern' && param.left.type === 'Identifier') {
        return param.left.name;
      }
      break;
    }
    default:
      break;
  }
  throw new InvariantViolationError(`Unexpected node type: ${node.type}`, {
    lineNumber: node.loc?.start.line,
    nodeType: node.type,
  });
}
