import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { ServiceConfig, serviceConfigSchema } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'user-api.config.json';

export interface ConfigOverrides {
  host?: string;
  port?: string | number;
  accessLog?: boolean;
}

export function resolveConfigPath(cwd: string, configPath?: string): string {
  if (configPath) {
    return path.resolve(configPath);
  }
  return path.resolve(cwd, DEFAULT_CONFIG_FILE);
}

function parseConfigFile(configPath: string): unknown {
  const raw = fs.readFileSync(configPath, 'utf-8');
  const ext = path.extname(configPath).toLowerCase();
  try {
    return ext === '.yaml' || ext === '.yml' ? yaml.parse(raw) : JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse config ${configPath}: ${message}`);
  }
}

/**
 * Read and validate a config file. An empty YAML document counts as `{}`.
 */
export function loadConfig(configPath: string): ServiceConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config not found: ${configPath}`);
  }
  const parsed = parseConfigFile(configPath) ?? {};
  return serviceConfigSchema.parse(parsed);
}

// Blank variables count as unset.
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the effective config.
 *
 * Precedence, lowest first: schema defaults, config file, environment
 * (`HOST`, `PORT`, `APP_VERSION`), explicit overrides from the CLI. The
 * default config file is optional; an explicitly named one must exist.
 */
export function resolveConfig(options: {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
} = {}): ServiceConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const configPath = resolveConfigPath(cwd, options.configPath);

  const base = options.configPath || fs.existsSync(configPath)
    ? loadConfig(configPath)
    : serviceConfigSchema.parse({});

  return serviceConfigSchema.parse({
    server: {
      host: overrides.host ?? envValue(env, 'HOST') ?? base.server.host,
      port: overrides.port ?? envValue(env, 'PORT') ?? base.server.port
    },
    service: {
      name: base.service.name,
      version: envValue(env, 'APP_VERSION') ?? base.service.version
    },
    logging: {
      access_log: overrides.accessLog ?? base.logging.access_log
    }
  });
}
