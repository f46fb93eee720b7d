/**
 * Configuration Merger
 *
 * Merges user configuration over the built-in defaults, substitutes
 * `${VAR}` / `${VAR:-fallback}` placeholders from the environment, and
 * validates every field of the result.
 */

import { ConfigError } from '../errors.js';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from './types.js';

export type ConfigObject = { [key: string]: unknown };

export interface MergerOptions {
  /** Variables for placeholder substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /**
   * Fail when a Neo4j setting is unresolved (default: true). Dry runs need
   * no connection and pass false.
   */
  requireNeo4j?: boolean;
}

const SECTIONS = ['neo4j', 'pipeline', 'retry', 'logging'];
const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with user config taking precedence over defaults.
 * Arrays and scalars replace; undefined user values are skipped.
 */
export function deepMerge(defaults: ConfigObject, userConfig: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...defaults };

  for (const [key, userValue] of Object.entries(userConfig)) {
    if (userValue === undefined) continue;
    const defaultValue = defaults[key];
    result[key] = isConfigObject(defaultValue) && isConfigObject(userValue)
      ? deepMerge(defaultValue, userValue)
      : userValue;
  }
  return result;
}

/**
 * Replace placeholders in every string of `value`. Variables that are unset
 * and have no fallback become '' and are added to `missing`.
 */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined && resolved !== '') return resolved;
      if (fallback !== undefined) return fallback;
      missing.add(name);
      return '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnv(item, env, missing));
  }
  if (isConfigObject(value)) {
    const result: ConfigObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnv(item, env, missing);
    }
    return result;
  }
  return value;
}

/**
 * Merge user configuration with defaults.
 *
 * @throws ConfigError on unknown sections, invalid values or unresolved
 * Neo4j placeholders
 */
export function mergeWithDefaults(userConfig: unknown, options: MergerOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const requireNeo4j = options.requireNeo4j ?? true;

  if (userConfig !== null && userConfig !== undefined && !isConfigObject(userConfig)) {
    throw new ConfigError('Configuration must be a mapping');
  }
  const user = isConfigObject(userConfig) ? userConfig : {};
  for (const key of Object.keys(user)) {
    if (!SECTIONS.includes(key)) {
      throw new ConfigError(`Unknown configuration section "${key}" (expected one of: ${SECTIONS.join(', ')})`);
    }
  }

  const defaults: ConfigObject = Object.fromEntries(Object.entries(DEFAULT_PIPELINE_CONFIG));
  const merged = deepMerge(defaults, user);

  const neo4jMissing = new Set<string>();
  const otherMissing = new Set<string>();
  const neo4j = section(substituteEnv(merged.neo4j, env, neo4jMissing), 'neo4j');
  const pipeline = section(substituteEnv(merged.pipeline, env, otherMissing), 'pipeline');
  const retry = section(substituteEnv(merged.retry, env, otherMissing), 'retry');
  const logging = section(substituteEnv(merged.logging, env, otherMissing), 'logging');

  if (otherMissing.size > 0) {
    throw new ConfigError(`Unset environment variable(s): ${[...otherMissing].join(', ')}`);
  }
  if (requireNeo4j && neo4jMissing.size > 0) {
    throw new ConfigError(
      `Neo4j connection needs environment variable(s): ${[...neo4jMissing].join(', ')}`
    );
  }

  const database = optionalString(neo4j, 'neo4j', 'database');
  const config: PipelineConfig = {
    neo4j: {
      uri: requireNeo4j ? requiredString(neo4j, 'neo4j', 'uri') : optionalString(neo4j, 'neo4j', 'uri') ?? '',
      username: requireNeo4j
        ? requiredString(neo4j, 'neo4j', 'username')
        : optionalString(neo4j, 'neo4j', 'username') ?? '',
      password: optionalString(neo4j, 'neo4j', 'password') ?? '',
      database: database === '' ? undefined : database,
      maxConnectionPoolSize: readNumber(neo4j, 'neo4j', 'maxConnectionPoolSize', { min: 1, integer: true }),
    },
    pipeline: {
      maxBatchSize: readNumber(pipeline, 'pipeline', 'maxBatchSize', { min: 1, integer: true }),
      maxPendingBatches: readNumber(pipeline, 'pipeline', 'maxPendingBatches', { min: 1, integer: true }),
      transactionTimeoutMs: readNumber(pipeline, 'pipeline', 'transactionTimeoutMs', { min: 0 }),
      skipTransform: readBoolean(pipeline, 'pipeline', 'skipTransform'),
    },
    retry: {
      maxAttempts: readNumber(retry, 'retry', 'maxAttempts', { min: 1, integer: true }),
      initialDelayMs: readNumber(retry, 'retry', 'initialDelayMs', { min: 0 }),
      maxDelayMs: readNumber(retry, 'retry', 'maxDelayMs', { min: 0 }),
      backoffFactor: readNumber(retry, 'retry', 'backoffFactor', { min: 1 }),
    },
    logging: {
      verbose: readBoolean(logging, 'logging', 'verbose'),
    },
  };

  return config;
}

// ============================================
// Field readers
// ============================================

function section(value: unknown, name: string): ConfigObject {
  if (!isConfigObject(value)) {
    throw new ConfigError(`"${name}" must be a mapping`);
  }
  return value;
}

function requiredString(values: ConfigObject, sectionName: string, key: string): string {
  const value = optionalString(values, sectionName, key);
  if (value === undefined || value === '') {
    throw new ConfigError(`${sectionName}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(values: ConfigObject, sectionName: string, key: string): string | undefined {
  const value = values[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${sectionName}.${key} must be a string`);
  }
  return value;
}

function readNumber(
  values: ConfigObject,
  sectionName: string,
  key: string,
  rules: { min: number; integer?: boolean }
): number {
  const raw = values[key];
  // Placeholders substitute to strings
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${sectionName}.${key} must be a number`);
  }
  if (rules.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${sectionName}.${key} must be an integer, got ${value}`);
  }
  if (value < rules.min) {
    throw new ConfigError(`${sectionName}.${key} must be >= ${rules.min}, got ${value}`);
  }
  return value;
}

function readBoolean(values: ConfigObject, sectionName: string, key: string): boolean {
  const value = values[key];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigError(`${sectionName}.${key} must be true or false`);
}
