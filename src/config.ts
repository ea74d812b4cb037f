/**
 * Loader configuration: search paths, scan limits and logging.
 *
 * Precedence is defaults < YAML file < environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError, toError } from './errors.js';

/**
 * Configuration accessor with dot-path key support.
 */
export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }
}

export const LoaderConfigSchema = Type.Object({
  dataDirs: Type.Array(Type.String({ minLength: 1 })),
  pluginPaths: Type.Array(Type.String({ minLength: 1 })),
  scan: Type.Object({
    maxDepth: Type.Integer({ minimum: 1 }),
    followSymlinks: Type.Boolean(),
  }),
  logging: Type.Object({
    level: Type.Union([
      Type.Literal('trace'),
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
      Type.Literal('fatal'),
    ]),
    format: Type.Union([Type.Literal('json'), Type.Literal('text')]),
  }),
});

export type LoaderConfig = Static<typeof LoaderConfigSchema>;

export const ENV_PLUGIN_PATH = 'PACKLOADER_PLUGIN_PATH';
export const ENV_LOG_LEVEL = 'PACKLOADER_LOG_LEVEL';

const DEFAULT_SYSTEM_DATA_DIRS = ['/usr/local/share', '/usr/share'];

export interface LoadConfigOptions {
  /** YAML file to read; must exist when given. */
  path?: string;
  env?: Record<string, string | undefined>;
  homeDir?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function splitPathList(value: string): string[] {
  return value.split(':').filter((p) => p.length > 0);
}

/** XDG data directories, user directory first. */
export function standardDataDirs(
  env: Record<string, string | undefined> = process.env,
  homeDir: string = homedir(),
): string[] {
  const userDir = env['XDG_DATA_HOME'] || join(homeDir, '.local', 'share');
  const systemDirs = env['XDG_DATA_DIRS'] ? splitPathList(env['XDG_DATA_DIRS']) : DEFAULT_SYSTEM_DATA_DIRS;
  return [userDir, ...systemDirs];
}

export function defaultConfig(homeDir: string = homedir()): LoaderConfig {
  return {
    dataDirs: [join(homeDir, '.local', 'share'), ...DEFAULT_SYSTEM_DATA_DIRS],
    pluginPaths: [],
    scan: { maxDepth: 8, followSymlinks: false },
    logging: { level: 'info', format: 'json' },
  };
}

function readConfigFile(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigNotFoundError(path);
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in configuration file: ${path}`, { cause: toError(e) });
  }
  if (parsed === null || parsed === undefined) return new Config();
  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file must be a YAML mapping: ${path}`);
  }
  return new Config(parsed);
}

export function validateConfig(candidate: unknown): LoaderConfig {
  if (Value.Check(LoaderConfigSchema, candidate)) {
    return candidate;
  }
  const problems: string[] = [];
  for (const error of Value.Errors(LoaderConfigSchema, candidate)) {
    problems.push(`${error.path || '/'}: ${error.message}`);
  }
  throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
}

export function loadConfig(options?: LoadConfigOptions): LoaderConfig {
  const env = options?.env ?? process.env;
  const homeDir = options?.homeDir ?? homedir();
  const defaults = defaultConfig(homeDir);
  const file = options?.path !== undefined ? readConfigFile(options.path) : new Config();

  let dataDirs = file.get('dataDirs', defaults.dataDirs);
  if (env['XDG_DATA_HOME'] || env['XDG_DATA_DIRS']) {
    dataDirs = standardDataDirs(env, homeDir);
  }

  let pluginPaths = file.get('pluginPaths', defaults.pluginPaths);
  const envPluginPath = env[ENV_PLUGIN_PATH];
  if (envPluginPath) {
    pluginPaths = splitPathList(envPluginPath);
  }

  return validateConfig({
    dataDirs,
    pluginPaths,
    scan: {
      maxDepth: file.get('scan.maxDepth', defaults.scan.maxDepth),
      followSymlinks: file.get('scan.followSymlinks', defaults.scan.followSymlinks),
    },
    logging: {
      level: env[ENV_LOG_LEVEL] || file.get('logging.level', defaults.logging.level),
      format: file.get('logging.format', defaults.logging.format),
    },
  });
}
