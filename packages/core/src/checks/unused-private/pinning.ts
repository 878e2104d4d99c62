/**
 * Whether a property reference keeps the property alive.
 *
 * Every reference pins unless it is one of:
 * - a whole expression statement (`this.x;`)
 * - the target of a plain assignment (`this.x = 1`)
 * - the target of a compound assignment or increment whose result is
 *   discarded (`this.x += 1;`, `this.x++;`)
 */
import type { NodePath } from '@babel/traverse';

export function isPinningPropertyUse(path: NodePath): boolean {
  const parent = path.parentPath;
  if (parent === null) {
    return true;
  }

  const parentNode = parent.node;
  switch (parentNode.type) {
    case 'ExpressionStatement':
      return false;
    case 'AssignmentExpression':
      if (parentNode.left !== path.node) {
        return true;
      }
      return parentNode.operator === '=' ? false : isExpressionResultUsed(parent);
    case 'UpdateExpression':
      return isExpressionResultUsed(parent);
    default:
      return true;
  }
}

/**
 * Whether the value of the expression at `path` can be observed.
 * Conservative: any position not known to discard the value counts as used.
 */
export function isExpressionResultUsed(path: NodePath): boolean {
  const parent = path.parentPath;
  if (parent === null) {
    return true;
  }

  const node = path.node;
  const parentNode = parent.node;
  switch (parentNode.type) {
    case 'ExpressionStatement':
      return false;
    case 'TSAsExpression':
    case 'TSSatisfiesExpression':
    case 'TSTypeAssertion':
    case 'TSNonNullExpression':
    case 'TypeCastExpression':
      return isExpressionResultUsed(parent);
    case 'ConditionalExpression':
      return parentNode.test === node || isExpressionResultUsed(parent);
    case 'LogicalExpression':
      return parentNode.left === node || isExpressionResultUsed(parent);
    case 'SequenceExpression': {
      const last = parentNode.expressions[parentNode.expressions.length - 1];
      return last === node ? isExpressionResultUsed(parent) : false;
    }
    case 'ForStatement':
      // Only the loop condition's value is read
      return parentNode.test === node;
    default:
      return true;
  }
}
