/**
 * Configuration Management
 *
 * Loads application settings from defaults, a JSON file and the environment.
 * The server itself only takes an explicit address; this is for entry points.
 */

import { readFile } from 'node:fs/promises';
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  host: string;
  port: number;
  env: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const DEFAULT_CONFIG: ConfigOptions = {
  host: '127.0.0.1',
  port: 3000,
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: Partial<ConfigOptions> = {}) {
    this.config = {
      host: options.host ?? DEFAULT_CONFIG.host,
      port: options.port ?? DEFAULT_CONFIG.port,
      env: options.env ?? DEFAULT_CONFIG.env,
      logLevel: options.logLevel ?? DEFAULT_CONFIG.logLevel,
      logFormat: options.logFormat ?? DEFAULT_CONFIG.logFormat,
    };
  }

  get<K extends keyof ConfigOptions>(key: K): ConfigOptions[K] {
    return this.config[key];
  }

  set<K extends keyof ConfigOptions>(key: K, value: ConfigOptions[K]): void {
    this.config[key] = value;
  }

  /**
   * Check if a key differs from its default
   */
  has(key: keyof ConfigOptions): boolean {
    return this.config[key] !== DEFAULT_CONFIG[key];
  }

  all(): ConfigOptions {
    return { ...this.config };
  }
}

/**
 * Load configuration: defaults, then the JSON file, then environment
 * variables (HOST, PORT, NODE_ENV, LOG_LEVEL, LOG_FORMAT).
 * A missing file is skipped; an unreadable or invalid one throws.
 */
export async function loadConfig(
  configPath = './config/app.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fileConfig = await readConfigFile(configPath);

  return new Config({
    ...fileConfig,
    ...parseOptions(
      {
        host: env.HOST,
        port: env.PORT,
        env: env.NODE_ENV,
        logLevel: env.LOG_LEVEL,
        logFormat: env.LOG_FORMAT,
      },
      'environment'
    ),
  });
}

async function readConfigFile(path: string): Promise<Partial<ConfigOptions>> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parseOptions(parsed, path);
}

function parseOptions(raw: Record<string, unknown>, source: string): Partial<ConfigOptions> {
  const options: Partial<ConfigOptions> = {};

  if (raw.host !== undefined) {
    if (typeof raw.host !== 'string' || raw.host === '') {
      throw new ConfigError(`Invalid host in ${source}`);
    }
    options.host = raw.host;
  }

  if (raw.port !== undefined) {
    const port =
      typeof raw.port === 'string' && /^\d+$/.test(raw.port) ? Number(raw.port) : raw.port;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid port in ${source}: ${String(raw.port)}`);
    }
    options.port = port;
  }

  if (raw.env !== undefined) {
    if (typeof raw.env !== 'string') {
      throw new ConfigError(`Invalid env in ${source}`);
    }
    options.env = raw.env;
  }

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(`Invalid logLevel in ${source}: ${String(raw.logLevel)}`);
    }
    options.logLevel = raw.logLevel;
  }

  if (raw.logFormat !== undefined) {
    if (!isLogFormat(raw.logFormat)) {
      throw new ConfigError(`Invalid logFormat in ${source}: ${String(raw.logFormat)}`);
    }
    options.logFormat = raw.logFormat;
  }

  return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
