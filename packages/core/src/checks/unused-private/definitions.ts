import type { Node } from '@babel/types';
import { InvariantViolationError } from '../../errors/PropsweepError.js';
import { getQualifiedName } from '../../ast/qualifiedName.js';
import { isPropertyReference } from '../../ast/propertyReference.js';
import type { ClassRegistry } from './ClassRegistry.js';

/**
 * Whether a property reference has the shape of a property definition:
 * `this.x`, `Foo.x` for a registered class `Foo`, or `Anything.prototype.x`.
 *
 * @throws InvariantViolationError when `node` is not a property reference
 */
export function isCandidatePropertyDefinition(node: Node, registry: ClassRegistry): boolean {
  if (!isPropertyReference(node)) {
    throw new InvariantViolationError(`Expected a property reference, got ${node.type}`, {
      lineNumber: node.loc?.start.line,
      nodeType: node.type,
    });
  }

  const target = node.object;
  if (target.type === 'ThisExpression') {
    return true;
  }

  const targetName = getQualifiedName(target);
  if (targetName !== undefined && registry.has(targetName)) {
    return true;
  }

  return isPropertyReference(target) && target.property.name === 'prototype';
}
