import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type TallyConfig,
  DEFAULT_CONFIG,
  tallyConfigSchema,
  ConfigError,
} from '@tally/shared';

type PlainObject = Record<string, unknown>;

export interface ConfigLoadOptions {
  configPath?: string;
  /** Applied last, after the file and the environment (CLI flags). */
  overrides?: PlainObject;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

const CONFIG_FILE_NAMES = ['tally.config.yaml', 'tally.config.yml', 'tally.config.json'];

export class ConfigManager {
  private config: TallyConfig | null = null;

  async load(options: ConfigLoadOptions = {}): Promise<TallyConfig> {
    // 1. Start with defaults
    let merged: PlainObject = structuredClone(DEFAULT_CONFIG);

    // 2. Config file
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd ?? process.cwd());
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Environment
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    // 4. Explicit overrides
    if (options.overrides) {
      merged = deepMerge(merged, options.overrides);
    }

    // 5. Validate
    const result = tallyConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', '),
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof TallyConfig>(key: K): TallyConfig[K] {
    return this.getAll()[key];
  }

  getAll(): TallyConfig {
    if (!this.config) {
      throw new ConfigError('configuration has not been loaded');
    }
    return this.config;
  }

  private async loadConfigFile(configPath: string | undefined, cwd: string): Promise<PlainObject | null> {
    if (configPath) {
      const p = resolve(cwd, configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`config file not found: ${p}`);
      }
      return parseConfigFile(p);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd);
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }
}

async function parseConfigFile(p: string): Promise<PlainObject> {
  const content = await readFile(p, 'utf-8');
  let parsed: unknown;
  try {
    parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed == null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${p} must contain a mapping at the top level`);
  }
  return parsed;
}

function loadEnvVars(env: NodeJS.ProcessEnv): PlainObject {
  const server: PlainObject = {};
  const auth: PlainObject = {};
  const config: PlainObject = {};

  if (env.TALLY_PORT) server.port = parseInt(env.TALLY_PORT, 10);
  if (env.TALLY_HOST) server.host = env.TALLY_HOST;
  if (env.TALLY_JWT_SECRET) auth.jwtSecret = env.TALLY_JWT_SECRET;
  if (env.TALLY_TOKEN_EXPIRE_MINUTES) {
    auth.accessTokenExpireMinutes = parseInt(env.TALLY_TOKEN_EXPIRE_MINUTES, 10);
  }

  if (Object.keys(server).length > 0) config.server = server;
  if (Object.keys(auth).length > 0) config.auth = auth;
  if (env.TALLY_DB_PATH) config.database = { path: env.TALLY_DB_PATH };
  if (env.TALLY_LOG_LEVEL) config.logging = { level: env.TALLY_LOG_LEVEL };

  return config;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    result[key] = isPlainObject(from) && isPlainObject(into) ? deepMerge(into, from) : from;
  }
  return result;
}

/** Config safe to print: the signing secret is masked. */
export function redactConfig(config: TallyConfig): TallyConfig {
  return {
    ...config,
    auth: { ...config.auth, jwtSecret: '********' },
  };
}
