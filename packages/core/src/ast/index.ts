export { parseSource, parserPluginsFor, SOURCE_EXTENSIONS } from './parse.js';
export type { ParsedSource } from './parse.js';
export { getTraverseFunction } from './babelTraverse.js';
export type { TraverseFunction } from './babelTraverse.js';
export {
  resolveVisibility,
  findJSDoc,
  getJSDocComment,
  parseJSDocTags,
  annotationFromJSDoc,
  getAccessibility,
} from './jsdoc.js';
export { getQualifiedName, getObjectKeyName, getBestLValueName } from './qualifiedName.js';
export { isPropertyReference, getPropertyName } from './propertyReference.js';
export type { PropertyReferenceNode } from './propertyReference.js';
export { DefaultCodingConvention, DEFAULT_PROPERTY_RENAME_FUNCTIONS } from './CodingConvention.js';
export type { CodingConvention } from './CodingConvention.js';
