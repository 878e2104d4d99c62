export { UnusedPrivatePropertyCheck, handleEvent } from './UnusedPrivatePropertyCheck.js';
export type { TraversalState } from './UnusedPrivatePropertyCheck.js';
export { ClassRegistry } from './ClassRegistry.js';
export { CompilationState, FileUseState, CONSTRUCTOR_NAME } from './FileUseState.js';
export type { Candidate } from './FileUseState.js';
export { isCandidatePropertyDefinition } from './definitions.js';
export { isPinningPropertyUse, isExpressionResultUsed } from './pinning.js';
export { classifyVisibility, isCheckablePrivateDeclaration, declaresClass } from './visibility.js';
export type { VisibilityClass } from './visibility.js';
export { classifyEnter, classifyExit } from './events.js';
export type { PassEvent } from './events.js';
