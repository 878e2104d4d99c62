/**
 * Visibility resolution from JSDoc and TypeScript modifiers.
 *
 * A declaration's annotation is the nearest `/** ... *\/` block comment that
 * documents it. Comments are attached by the parser to the outermost node
 * starting right after them, so for `/** @private *\/ this.x = 1;` the
 * comment sits on the statement, not on `this.x`. findJSDoc climbs from the
 * node to the node that carries its comment.
 */
import type { NodePath } from '@babel/traverse';
import type { Node, Comment } from '@babel/types';
import type { Visibility, VisibilityAnnotation } from '@propsweep/types';

const TAG_PATTERN = /(?:^|[\s*])@([A-Za-z]+)/g;

const VISIBILITY_TAGS: ReadonlyArray<[tag: string, visibility: Visibility]> = [
  ['private', 'private'],
  ['protected', 'protected'],
  ['package', 'package'],
  ['public', 'public'],
];

/**
 * Text of the last JSDoc block comment in front of a node, without the
 * leading `*`.
 */
export function getJSDocComment(node: Node): string | undefined {
  const comments: readonly Comment[] = node.leadingComments ?? [];
  for (let i = comments.length - 1; i >= 0; i--) {
    const comment = comments[i];
    if (comment.type === 'CommentBlock' && comment.value.startsWith('*')) {
      return comment.value.slice(1);
    }
  }
  return undefined;
}

export function parseJSDocTags(comment: string): Set<string> {
  const tags = new Set<string>();
  for (const match of comment.matchAll(TAG_PATTERN)) {
    tags.add(match[1]);
  }
  return tags;
}

export function annotationFromJSDoc(comment: string): VisibilityAnnotation {
  const tags = parseJSDocTags(comment);
  const visibility = VISIBILITY_TAGS.find(([tag]) => tags.has(tag))?.[1] ?? 'unspecified';
  return {
    visibility,
    isConstructor: tags.has('constructor'),
    isInterface: tags.has('interface') || tags.has('record'),
    isTypedef: tags.has('typedef'),
  };
}

/**
 * Find the JSDoc that documents the node at `path`, climbing to the node
 * that carries it:
 * - either side of a plain `=` assignment takes the assignment's JSDoc
 * - an expression that is a whole statement takes the statement's
 * - an initializer of a single-variable declaration takes the declaration's
 * - an object literal value takes its key's
 * - an exported declaration takes the export statement's
 */
export function findJSDoc(path: NodePath): string | undefined {
  const own = getJSDocComment(path.node);
  if (own !== undefined) {
    return own;
  }

  const parent = path.parentPath;
  if (parent === null) {
    return undefined;
  }

  const node = path.node;
  const parentNode = parent.node;
  switch (parentNode.type) {
    case 'AssignmentExpression':
      return parentNode.operator === '=' ? findJSDoc(parent) : undefined;
    case 'ExpressionStatement':
      return getJSDocComment(parentNode);
    case 'VariableDeclarator':
      return parentNode.init === node ? findJSDoc(parent) : undefined;
    case 'VariableDeclaration':
      return parentNode.declarations.length === 1 ? findJSDoc(parent) : undefined;
    case 'ObjectProperty':
      return parentNode.value === node ? getJSDocComment(parentNode) : undefined;
    case 'ExportNamedDeclaration':
    case 'ExportDefaultDeclaration':
      return getJSDocComment(parentNode);
    default:
      return undefined;
  }
}

/**
 * TypeScript `private` / `protected` / `public` on a class member or
 * parameter property.
 */
export function getAccessibility(node: Node): Visibility | undefined {
  switch (node.type) {
    case 'ClassMethod':
    case 'ClassProperty':
    case 'ClassAccessorProperty':
    case 'TSDeclareMethod':
    case 'TSParameterProperty':
      return node.accessibility ?? undefined;
    default:
      return undefined;
  }
}

/**
 * Resolve the annotation for a declaration. JSDoc visibility wins; the
 * TypeScript modifier fills in when JSDoc names none. Returns undefined when
 * the declaration carries neither.
 */
export function resolveVisibility(path: NodePath): VisibilityAnnotation | undefined {
  const comment = findJSDoc(path);
  const accessibility = getAccessibility(path.node);

  if (comment === undefined) {
    return accessibility === undefined
      ? undefined
      : { visibility: accessibility, isConstructor: false, isInterface: false, isTypedef: false };
  }

  const annotation = annotationFromJSDoc(comment);
  if (annotation.visibility === 'unspecified' && accessibility !== undefined) {
    return { ...annotation, visibility: accessibility };
  }
  return annotation;
}
