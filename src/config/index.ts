import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../log.js';
import { DefaultsRegistry } from '../lib/format/defaults.js';
import { ConfigError } from '../lib/format/errors.js';
import { userOptionsSchema, validateUserOptions, type UserOptions } from '../lib/format/options.js';
import { resolveRuntime } from './runtime.js';

export type ConfigFileErrorCode = 'unreadable' | 'bad_json' | 'invalid';

export class ConfigFileError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigFileErrorCode,
    public readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigFileError';
  }
}

const configFileSchema = z.object({
  defaults: userOptionsSchema.default({}),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type LoadedConfig = {
  file: string;
  found: boolean;
  defaults: UserOptions;
};

export function stripComments(jsonText: string): string {
  // Allow // and /* */ comments in the config file
  return jsonText
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '');
}

export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = resolveRuntime(env).configPath;
  return explicit ? path.resolve(explicit) : path.resolve(process.cwd(), 'config', 'sciprint.json');
}

/**
 * Read and validate the config file. A missing file is not an error and
 * yields empty defaults.
 *
 * @throws ConfigFileError
 */
export function loadConfig(file: string = configFilePath()): LoadedConfig {
  if (!fs.existsSync(file)) {
    logger.debug({ file }, 'config file not found, using built-in defaults');
    return { file, found: false, defaults: {} };
  }

  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new ConfigFileError(`Cannot read config file ${file}`, 'unreadable', file, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(stripComments(raw) || '{}');
  } catch (err) {
    throw new ConfigFileError(`Config file ${file} is not valid JSON`, 'bad_json', file, { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigFileError(`Config file ${file}: ${where}: ${issue?.message ?? 'invalid'}`, 'invalid', file);
  }

  try {
    const defaults = validateUserOptions(parsed.data.defaults);
    logger.debug({ file, keys: Object.keys(defaults) }, 'config loaded');
    return { file, found: true, defaults };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigFileError(`Config file ${file}: ${err.message}`, 'invalid', file, { cause: err });
    }
    throw err;
  }
}

/** Registry seeded with the config file's defaults */
export function loadDefaultsRegistry(file?: string): DefaultsRegistry {
  const { defaults } = loadConfig(file);
  return new DefaultsRegistry(defaults);
}
