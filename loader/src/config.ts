import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { Ajv2020 } from 'ajv/dist/2020.js';
import type { LogLevel } from '@depman/core';

export type DepmanConfig = {
  registry?: { name?: string };
  autoload?: { dirs: string[] };
  logging?: { level?: LogLevel };
};

export const CONFIG_FILE_NAMES = ['depman.config.ts', 'depman.config.js', 'depman.config.mjs'] as const;

// Draft 2020-12; unknown keys are rejected so typos surface at startup.
export const DEPMAN_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    registry: {
      type: 'object',
      properties: { name: { type: 'string', minLength: 1 } },
      additionalProperties: false,
    },
    autoload: {
      type: 'object',
      properties: { dirs: { type: 'array', items: { type: 'string', minLength: 1 } } },
      required: ['dirs'],
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      properties: { level: { type: 'string', enum: ['silent', 'error', 'warn', 'info', 'debug'] } },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const satisfies Record<string, unknown>;

export type ConfigErrorCode = 'config_load_error' | 'config_invalid';

/** Raised while finding, importing or validating `depman.config.ts`. */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  /** The config file, or the directory searched when none was found. */
  readonly path?: string;

  constructor(code: ConfigErrorCode, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConfigError';
    this.code = code;
    this.path = options.path;
  }
}

export class ConfigLoadError extends ConfigError {
  constructor(message: string, options: { path: string; cause?: unknown }) {
    super('config_load_error', message, options);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigValidationError extends ConfigError {
  readonly ajvErrors: unknown[];

  constructor(message: string, ajvErrors: unknown[] = [], path?: string) {
    super('config_invalid', message, { path });
    this.name = 'ConfigValidationError';
    this.ajvErrors = ajvErrors;
  }
}

const ajv = new Ajv2020({ allErrors: true });
const validateConfig = ajv.compile<DepmanConfig>(DEPMAN_CONFIG_SCHEMA);

export function validateDepmanConfig(value: unknown, configPath?: string): DepmanConfig {
  if (!validateConfig(value)) {
    const errors = validateConfig.errors ?? [];
    const summary = errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
    throw new ConfigValidationError(`Invalid depman config: ${summary}`, errors, configPath);
  }
  return value;
}

export function resolveAppPath(cwd: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(cwd, p);
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(cwd, name);
    if (fs.existsSync(p)) return p;
  }
  return null;
}

export async function loadDepmanConfig(cwd = process.cwd()): Promise<DepmanConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) throw new ConfigLoadError(`Missing depman.config.ts in ${cwd}`, { path: cwd });

  let mod: unknown;
  try {
    mod = await import(pathToFileURL(configPath).toString());
  } catch (e) {
    throw new ConfigLoadError(`Failed to import ${configPath}`, { path: configPath, cause: e });
  }

  const cfg = exportedConfig(mod);
  if (cfg === undefined) throw new ConfigLoadError(`${path.basename(configPath)} must export default config object`, { path: configPath });
  return validateDepmanConfig(cfg, configPath);
}

function exportedConfig(mod: unknown): unknown {
  if (!mod || typeof mod !== 'object') return undefined;
  return Reflect.get(mod, 'default') ?? Reflect.get(mod, 'config');
}
