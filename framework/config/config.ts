/**
 * Configuration Management
 *
 * Loads and manages application configuration from defaults, a JSON file
 * and environment variables (in that order of precedence, lowest first).
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors.ts';
import { isValidHeartbeatInterval } from '../realtime/events.ts';
import { isLogLevel, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  sse?: {
    heartbeatInterval?: number;
    retryMs?: number;
    closeEvent?: string;
  };
  [key: string]: unknown;
}

/**
 * Resolved settings the application runs with
 */
export interface AppSettings {
  port: number;
  host: string;
  env: string;
  debug: boolean;
  logLevel: LogLevel;
  sseHeartbeatInterval: number;
  sseRetryMs: number | null;
  sseCloseEvent: string | null;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '127.0.0.1',
  env: 'development',
  debug: false,
  logLevel: 'info',
  sse: {
    heartbeatInterval: 15_000,
  },
};

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigRecord;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(structuredClone(DEFAULT_CONFIG), options);
  }

  /**
   * Get a configuration value by dot path ('sse.heartbeatInterval')
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a configuration value by dot path
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  all(): ConfigRecord {
    return structuredClone(this.config);
  }

  /**
   * Resolve the settings the application reads
   */
  settings(): AppSettings {
    const logLevel = this.get('logLevel');
    const retry = this.get('sse.retryMs');
    const closeEvent = this.get('sse.closeEvent');
    const heartbeat = this.get('sse.heartbeatInterval');

    return {
      port: this.getNumber('port', 8000),
      host: this.getString('host', '127.0.0.1'),
      env: this.getString('env', 'development'),
      debug: this.getBoolean('debug', false),
      logLevel: isLogLevel(logLevel) ? logLevel : 'info',
      sseHeartbeatInterval:
        typeof heartbeat === 'number' && isValidHeartbeatInterval(heartbeat) ? heartbeat : 15_000,
      sseRetryMs: typeof retry === 'number' && Number.isFinite(retry) && retry >= 0 ? retry : null,
      sseCloseEvent:
        typeof closeEvent === 'string' && closeEvent && !/[\r\n]/.test(closeEvent) ? closeEvent : null,
    };
  }
}

function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) && isRecord(current) ? mergeConfig(current, value) : value;
  }

  return result;
}

function getNestedValue(obj: ConfigRecord, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (!last) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

const DEFAULT_PATHS = ['./config/app.json', './config.json'];

/**
 * Load configuration from a JSON file and the environment.
 *
 * An explicit path must exist and parse. Without one, the default
 * locations are tried and missing files skipped.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: ConfigRecord = {};

  if (configPath) {
    fileConfig = await readConfigFile(configPath);
  } else {
    for (const path of DEFAULT_PATHS) {
      const found = await readConfigFile(path, true);
      if (found) {
        fileConfig = found;
        break;
      }
    }
  }

  const config = new Config(fileConfig);

  const envConfig: Record<string, unknown> = {
    port: parseIntEnv(env.PORT),
    host: env.HOST,
    env: env.NODE_ENV,
    debug: env.DEBUG === undefined ? undefined : env.DEBUG === 'true',
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined,
    'sse.heartbeatInterval': parseIntEnv(env.SSE_HEARTBEAT_INTERVAL),
    'sse.retryMs': parseIntEnv(env.SSE_RETRY_MS),
  };

  for (const [key, value] of Object.entries(envConfig)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}

async function readConfigFile(path: string, optional: true): Promise<ConfigRecord | null>;
async function readConfigFile(path: string): Promise<ConfigRecord>;
async function readConfigFile(path: string, optional = false): Promise<ConfigRecord | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (optional && isMissingFile(error)) return null;
    throw new ConfigurationError(`Cannot read config file '${path}': ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file '${path}' is not valid JSON: ${String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file '${path}' must contain a JSON object.`);
  }
  return parsed;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return parseInt(value, 10);
}
