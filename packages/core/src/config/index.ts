export {
  loadConfig,
  validateConfig,
  validateRegistryScope,
  validateDiagnosticLevel,
  DEFAULT_CONFIG,
  CONFIG_DIR,
} from './ConfigLoader.js';
export type { PropsweepConfig } from './ConfigLoader.js';
