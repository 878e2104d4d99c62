/**
 * propsweep version constant. Kept in step with the package.json files of
 * the workspace.
 */
export const PROPSWEEP_VERSION = '0.1.0';
