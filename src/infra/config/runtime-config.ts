import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { getConfigDir } from './config-paths.js';

/**
 * Config validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export interface ImageChatRuntimeConfig {
  gateway: {
    host: string;
    port: number;
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
    maxConnectionsPerIp: number;
    sessionIdleMs: number;
  };
  generation: {
    /** Backend credential; the mock backend is used when absent */
    apiKey?: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
    contextWindow: number;
  };
  storage: {
    /** `sqlite:///path`, `sqlite:///:memory:` or a bare file path */
    databaseUrl: string;
  };
  debug: {
    enabled: boolean;
  };
}

/**
 * Structure of <configDir>/imagechat.json; every field is optional
 */
export interface ImageChatConfigFile {
  $schema?: string;
  gateway?: Partial<ImageChatRuntimeConfig['gateway']>;
  generation?: Partial<ImageChatRuntimeConfig['generation']>;
  storage?: Partial<ImageChatRuntimeConfig['storage']>;
  debug?: Partial<ImageChatRuntimeConfig['debug']>;
}

export const DEFAULT_MODEL = 'gemini-2.5-flash-image';
export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_GENERATION_TIMEOUT_MS = 120_000;
export const DEFAULT_CONTEXT_WINDOW = 10;

export function getRuntimeConfigPath(): string {
  return path.join(getConfigDir(), 'imagechat.json');
}

export function getDefaultDatabaseUrl(): string {
  return `sqlite:///${path.join(getConfigDir(), 'image_chat.db')}`;
}

export function defaultRuntimeConfig(): ImageChatRuntimeConfig {
  return {
    gateway: {
      host: '127.0.0.1',
      port: 8000,
      heartbeatIntervalMs: 30_000,
      heartbeatTimeoutMs: 10_000,
      maxConnectionsPerIp: 10,
      sessionIdleMs: 30 * 60 * 1000,
    },
    generation: {
      model: DEFAULT_MODEL,
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: DEFAULT_GENERATION_TIMEOUT_MS,
      contextWindow: DEFAULT_CONTEXT_WINDOW,
    },
    storage: {
      databaseUrl: getDefaultDatabaseUrl(),
    },
    debug: {
      enabled: false,
    },
  };
}

const positiveInt = { type: 'integer', minimum: 1 } as const;

export const CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Image Chat Gateway Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    gateway: {
      type: 'object',
      properties: {
        host: { type: 'string', minLength: 1 },
        port: { type: 'integer', minimum: 1, maximum: 65535 },
        heartbeatIntervalMs: positiveInt,
        heartbeatTimeoutMs: positiveInt,
        maxConnectionsPerIp: positiveInt,
        sessionIdleMs: positiveInt,
      },
      additionalProperties: false,
    },
    generation: {
      type: 'object',
      properties: {
        apiKey: { type: 'string' },
        model: { type: 'string', minLength: 1 },
        baseUrl: { type: 'string', format: 'uri' },
        timeoutMs: positiveInt,
        contextWindow: { type: 'integer', minimum: 0 },
      },
      additionalProperties: false,
    },
    storage: {
      type: 'object',
      properties: {
        databaseUrl: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

/**
 * Validate a parsed config file against the JSON Schema
 */
export function validateConfigFile(value: unknown): ImageChatConfigFile {
  const validate = createValidator().compile<ImageChatConfigFile>(CONFIG_SCHEMA);

  if (!validate(value)) {
    const errors = (validate.errors || []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message || 'Unknown validation error',
    }));

    throw new ConfigValidationError(
      `Invalid config: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }

  return value;
}

/**
 * Read <configDir>/imagechat.json. Returns an empty config when the file is absent.
 */
export function loadConfigFile(configPath: string = getRuntimeConfigPath()): ImageChatConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid config: ${configPath} is not valid JSON (${message})`, [
      { path: '/', message },
    ]);
  }

  return validateConfigFile(parsed);
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toNonNegativeInt(value: unknown, fallback: number): number {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function toOptionalString(value: unknown, fallback: string | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

/**
 * Apply recognised environment variables on top of a config
 */
export function applyEnvironment(
  config: ImageChatRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): ImageChatRuntimeConfig {
  return {
    gateway: {
      ...config.gateway,
      host: toStringValue(env.IMAGECHAT_HOST, config.gateway.host),
      port: toPositiveInt(env.IMAGECHAT_PORT, config.gateway.port),
    },
    generation: {
      ...config.generation,
      apiKey: toOptionalString(env.GEMINI_API_KEY, config.generation.apiKey),
      model: toStringValue(env.GEMINI_MODEL, config.generation.model),
      timeoutMs: toPositiveInt(env.IMAGECHAT_GENERATION_TIMEOUT_MS, config.generation.timeoutMs),
      contextWindow: toNonNegativeInt(env.IMAGECHAT_CONTEXT_WINDOW, config.generation.contextWindow),
    },
    storage: {
      databaseUrl: toStringValue(env.DATABASE_URL, config.storage.databaseUrl),
    },
    debug: {
      enabled: toBoolean(env.IMAGECHAT_DEBUG, config.debug.enabled),
    },
  };
}

function mergeConfigFile(base: ImageChatRuntimeConfig, file: ImageChatConfigFile): ImageChatRuntimeConfig {
  return {
    gateway: { ...base.gateway, ...file.gateway },
    generation: { ...base.generation, ...file.generation },
    storage: { ...base.storage, ...file.storage },
    debug: { ...base.debug, ...file.debug },
  };
}

/**
 * Resolve the runtime config: defaults, then imagechat.json, then environment.
 * CLI flags are applied by the caller.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): ImageChatRuntimeConfig {
  return applyEnvironment(mergeConfigFile(defaultRuntimeConfig(), loadConfigFile()), env);
}

/**
 * Turn a store connection string into a better-sqlite3 filename
 */
export function resolveDatabasePath(databaseUrl: string): string {
  const trimmed = databaseUrl.trim();
  if (trimmed === ':memory:') {
    return trimmed;
  }

  const schemeMatch = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed);
  if (!schemeMatch) {
    return path.resolve(trimmed);
  }

  if (schemeMatch[1].toLowerCase() !== 'sqlite' || !trimmed.startsWith(`${schemeMatch[1]}:///`)) {
    throw new ConfigValidationError(`Unsupported database URL: ${databaseUrl}`, [
      { path: '/storage/databaseUrl', message: 'only sqlite:/// URLs are supported' },
    ]);
  }

  const target = trimmed.slice(`${schemeMatch[1]}:///`.length);
  if (target === ':memory:') {
    return target;
  }
  return path.resolve(target);
}
