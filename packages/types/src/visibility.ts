/**
 * Visibility Types - metadata resolved from a declaration's annotations
 */

export type Visibility = 'public' | 'protected' | 'private' | 'package' | 'unspecified';

/**
 * Annotation facts the checks read from a declaration.
 * A declaration with no annotation at all resolves to `undefined`, not to this.
 */
export interface VisibilityAnnotation {
  visibility: Visibility;
  /** Marked `@constructor` */
  isConstructor: boolean;
  /** Marked `@interface` or `@record` */
  isInterface: boolean;
  /** Marked `@typedef` */
  isTypedef: boolean;
}
