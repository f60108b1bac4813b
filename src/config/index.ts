export { parsePipelineConfig, loadConfigFile, resolveConfig } from './config-loader.js';
export type { ConfigOverrides, Environment } from './config-loader.js';
