import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ConfigError } from './errors';
import { configureLogger } from './logger';

// Checked in order when DOTENV_CONFIG_PATH is not set.
const ENV_FILES = ['.env.strategy', '.env'];

let loadedOnce = false;

export function resolveEnvPath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string | null {
  const explicit = env.DOTENV_CONFIG_PATH?.trim();
  if (explicit) return explicit;

  for (const name of ENV_FILES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Loads the env file into process.env (existing variables win) and applies
 * the logging settings it carries. Later calls are no-ops.
 */
export function loadEnvOnce(): { path: string | null; keys: string[] } {
  if (loadedOnce) return { path: null, keys: [] };
  loadedOnce = true;

  const envPath = resolveEnvPath();
  if (envPath) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      throw new ConfigError([`cannot read env file ${envPath}: ${result.error.message}`]);
    }
    configureLogger();
    return { path: envPath, keys: Object.keys(result.parsed ?? {}) };
  }

  configureLogger();
  return { path: null, keys: [] };
}
