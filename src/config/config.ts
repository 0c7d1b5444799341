/**
 * Config Loader
 *
 * Loads config/home-rag.json with {env:VAR} resolution.
 * Supports HOME_RAG_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/home-rag.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

/**
 * Thrown when the config file is missing, unreadable or invalid.
 * The entry point turns this into a fatal exit.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Parse and validate raw config text.
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): Config {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch {
    throw new ConfigurationError('Invalid JSON in config file');
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid config', issues);
  }

  return result.data;
}

/**
 * Load and validate config from file.
 */
export function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError(
        `Config file not found: ${configPath}`,
        ['Copy config/home-rag.example.json to config/home-rag.json and configure it.']
      );
    }
    throw err;
  }

  return parseConfig(text);
}

/**
 * Resolve the config path from the environment and load it.
 */
export function getConfig(): Config {
  const configPath = process.env['HOME_RAG_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
  return loadConfig(configPath);
}
