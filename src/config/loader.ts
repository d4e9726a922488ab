/**
 * Config Loader
 *
 * Priority: TG_* environment variables > config.<APP_ENV>.yaml > config.yaml
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { ConfigError, getErrorMessage } from '../models/errors.js';
import { mergeConfig } from './merge.js';
import { ConfigSchema, withDefaults, type Config } from './schema.js';

export const ENV_PREFIX = 'TG';
export const APP_ENV_VAR = 'APP_ENV';

/**
 * Paths that can be set from the environment even when no file mentions them
 */
const KNOWN_ENV_PATHS: ReadonlyArray<readonly string[]> = [
  ['proxy'],
  ['app_id'],
  ['app_hash'],
  ['reply_wait_seconds'],
  ['reply_history_limit'],
  ['language'],
  ['log', 'dir'],
  ['log', 'level'],
  ['log', 'format'],
];

export interface LoadedConfig {
  config: Config;
  sources: string[];   // Files that contributed, in merge order
}

/**
 * Load configuration from file, environment overlay file and environment variables
 * @throws ConfigError when a file cannot be read or does not match the schema
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): LoadedConfig {
  const sources = [configPath];
  let merged = parseConfig(readYaml(configPath), configPath);

  const appEnv = env[APP_ENV_VAR]?.trim();
  if (appEnv) {
    const overlayPath = environmentConfigPath(configPath, appEnv);
    if (fs.existsSync(overlayPath)) {
      merged = mergeConfig(merged, parseConfig(readYaml(overlayPath), overlayPath));
      sources.push(overlayPath);
    }
  }

  const withEnv = applyEnvOverrides(merged, env);
  return {
    config: withDefaults(parseConfig(withEnv, 'environment')),
    sources,
  };
}

/**
 * config.yaml + "prod" -> config.prod.yaml, next to the base file
 */
export function environmentConfigPath(configPath: string, appEnv: string): string {
  const ext = path.extname(configPath);
  const name = path.basename(configPath, ext);
  return path.join(path.dirname(configPath), `${name}.${appEnv}${ext}`);
}

/**
 * Apply TG_* variables. The variable name is the prefix plus the field
 * path joined by underscores, e.g. TG_ACCOUNTS_0_PHONE. Values are
 * coerced to the type of the value they replace.
 */
export function applyEnvOverrides(
  config: Config,
  env: NodeJS.ProcessEnv,
  prefix: string = ENV_PREFIX
): Record<string, unknown> {
  const root: Record<string, unknown> = structuredClone(config);

  const paths: string[][] = [];
  collectLeafPaths(root, [], paths);
  for (const known of KNOWN_ENV_PATHS) {
    if (!paths.some((p) => p.join('.') === known.join('.'))) {
      paths.push([...known]);
    }
  }

  for (const segments of paths) {
    const key = envKey(prefix, segments);
    const value = env[key];
    if (value === undefined) {
      continue;
    }
    setPath(root, segments, coerce(value, getPath(root, segments)));
  }
  return root;
}

export function envKey(prefix: string, segments: readonly string[]): string {
  return [prefix, ...segments].join('_').replace(/\./g, '_').toUpperCase();
}

function readYaml(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`failed to read config file ${filePath}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    return parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigError(`failed to parse config file ${filePath}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

function parseConfig(raw: unknown, source: string): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`invalid configuration in ${source}: ${issues}`, { cause: error });
    }
    throw error;
  }
}

function collectLeafPaths(node: unknown, prefix: string[], out: string[][]): void {
  if (Array.isArray(node)) {
    node.forEach((child, index) => collectLeafPaths(child, [...prefix, String(index)], out));
    return;
  }
  if (isRecord(node)) {
    for (const [key, child] of Object.entries(node)) {
      collectLeafPaths(child, [...prefix, key], out);
    }
    return;
  }
  out.push(prefix);
}

function getPath(root: Record<string, unknown>, segments: readonly string[]): unknown {
  let node: unknown = root;
  for (const segment of segments) {
    if (Array.isArray(node)) {
      node = node[Number(segment)];
    } else if (isRecord(node)) {
      node = node[segment];
    } else {
      return undefined;
    }
  }
  return node;
}

function setPath(root: Record<string, unknown>, segments: readonly string[], value: unknown): void {
  let node: unknown = root;
  for (const [i, segment] of segments.entries()) {
    const last = i === segments.length - 1;
    if (Array.isArray(node)) {
      const index = Number(segment);
      if (last) {
        node[index] = value;
      } else {
        node = node[index];
      }
    } else if (isRecord(node)) {
      if (last) {
        node[segment] = value;
      } else {
        if (node[segment] === undefined) {
          node[segment] = {};
        }
        node = node[segment];
      }
    } else {
      return;
    }
  }
}

function coerce(value: string, current: unknown): unknown {
  if (typeof current === 'number') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  if (typeof current === 'boolean' || (current === undefined && /^(true|false)$/i.test(value))) {
    return /^(true|1|yes)$/i.test(value.trim());
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
