import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { AppConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config } from './schema.js';

/** Environment variable that overrides the config file location */
export const CONFIG_PATH_ENV = 'STORAGE_BACKENDS_CONFIG';

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] ?? resolve(process.cwd(), 'config', 'config.json');
}

/**
 * Validate an already-parsed config object, applying defaults.
 * Throws ConfigInvalidError listing every offending path.
 */
export function parseConfig(rawConfig: unknown): Config {
  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}

export function loadConfig(configPath: string = defaultConfigPath()): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  return parseConfig(rawConfig);
}
