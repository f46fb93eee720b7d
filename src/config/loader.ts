/**
 * Config file loading
 *
 * Reads `cadgraph.yaml` (or an explicit path) and merges it with the
 * defaults. Without a file, the defaults plus environment apply.
 */

import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { mergeWithDefaults, type MergerOptions } from './merger.js';
import type { PipelineConfig } from './types.js';

export const CONFIG_FILE_NAMES = ['cadgraph.yaml', 'cadgraph.yml'];

export interface LoadConfigOptions extends MergerOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Directory searched for a default config file (default: cwd) */
  cwd?: string;
}

export interface LoadedConfig {
  config: PipelineConfig;
  /** File the config came from, if any */
  source?: string;
}

export async function loadPipelineConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const source = options.configPath
    ? path.resolve(options.cwd ?? process.cwd(), options.configPath)
    : await findConfigFile(options.cwd ?? process.cwd());

  if (!source) {
    return { config: mergeWithDefaults({}, options) };
  }

  let content: string;
  try {
    content = await fs.readFile(source, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${source}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${errorMessage(error)}`);
  }

  return { config: mergeWithDefaults(parsed, options), source };
}

async function findConfigFile(directory: string): Promise<string | undefined> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(directory, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}
