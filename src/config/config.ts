/**
 * Config Loader
 *
 * Loads config/clinigraph.json with {env:VAR} resolution.
 * Supports CLINIGRAPH_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/clinigraph.json';

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
 * Parse and validate raw config text.
 * Returns the list of issues instead of exiting so callers decide how to fail.
 */
export function parseConfig(
  text: string,
  env: NodeJS.ProcessEnv = process.env
): { ok: true; config: Config } | { ok: false; issues: string[] } {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch (error) {
    return { ok: false, issues: [`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    };
  }
  return { ok: true, config: result.data };
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Load and validate config from file.
 */
function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      console.error(`Config file not found: ${configPath}`);
      console.error(
        'Copy config/clinigraph.example.json to config/clinigraph.json and configure it.'
      );
      process.exit(1);
    }
    throw err;
  }

  const parsed = parseConfig(text);
  if (!parsed.ok) {
    console.error(`Invalid config (${configPath}):`);
    for (const issue of parsed.issues) {
      console.error(`  ${issue}`);
    }
    process.exit(1);
  }

  return parsed.config;
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath =
      process.env['CLINIGRAPH_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}

/**
 * Get display name for the reasoning model provider.
 * For openai-compatible providers, returns the configured providerName.
 */
export function getLLMDisplayName(config: Config): string {
  if (config.llm.provider === 'openai-compatible') {
    return config.llm.providerName ?? 'OpenAI-compatible';
  }
  return config.llm.provider.charAt(0).toUpperCase() + config.llm.provider.slice(1);
}
