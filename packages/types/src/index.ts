/**
 * @propsweep/types - Type definitions for the propsweep analysis toolkit
 */

// Check and logging types
export * from './checks.js';

// Diagnostic types
export * from './diagnostics.js';

// Declaration visibility metadata
export * from './visibility.js';
