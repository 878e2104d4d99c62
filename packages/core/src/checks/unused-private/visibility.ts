import type { NodePath } from '@babel/traverse';
import type { VisibilityAnnotation } from '@propsweep/types';
import { resolveVisibility } from '../../ast/jsdoc.js';

export interface VisibilityClass {
  isPrivate: boolean;
  isCheckable: boolean;
}

/**
 * Private declarations are checked unless they declare a typedef or an
 * interface; those are used from type positions this check cannot see.
 */
export function classifyVisibility(annotation: VisibilityAnnotation | undefined): VisibilityClass {
  const isPrivate = annotation?.visibility === 'private';
  return {
    isPrivate,
    isCheckable: isPrivate && annotation !== undefined && !annotation.isTypedef && !annotation.isInterface,
  };
}

export function isCheckablePrivateDeclaration(path: NodePath): boolean {
  return classifyVisibility(resolveVisibility(path)).isCheckable;
}

/**
 * Functions annotated `@constructor`, `@interface` or `@record` define a
 * class whose static properties can be declared as `Name.prop`.
 */
export function declaresClass(annotation: VisibilityAnnotation | undefined): boolean {
  return annotation !== undefined && (annotation.isConstructor || annotation.isInterface);
}
