export { loadConfig, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export { UserConfigSchema, type ValidatedUserConfig, type ChartDefaults } from './schema.js';
