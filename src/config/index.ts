export { loadPipelineConfig, CONFIG_FILE_NAMES, type LoadConfigOptions, type LoadedConfig } from './loader.js';
export { mergeWithDefaults, deepMerge, substituteEnv, type MergerOptions } from './merger.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  type PipelineSettings,
  type Neo4jConnectionConfig,
} from './types.js';
