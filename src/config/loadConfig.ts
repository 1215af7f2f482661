import fs from 'node:fs';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { getLoggerFor } from 'global-logger-factory';
import { ConfigError } from '../errors';
import {
  defaultConfig,
  type BackendChoice,
  type OrchestrationConfig,
  type ReadinessProbeSpec,
  type ServiceSpec,
  type SettleMode,
} from './OrchestrationConfig';

const logger = getLoggerFor('loadConfig');

export const DEFAULT_CONFIG_PATH = 'config/game-stack.json';

const BACKENDS: readonly BackendChoice[] = [ 'screen', 'tmux', 'native', 'auto' ];
const SETTLE_MODES: readonly SettleMode[] = [ 'fixed', 'probe' ];
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SESSION_NAME = /^[\w.-]+$/;

export interface ConfigOverrides {
  backend?: string;
  sessionName?: string;
  settle?: string;
}

export interface LoadConfigOptions {
  workingRoot?: string;
  /** Explicit path; must exist. Without it the default file is used when present. */
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalNumber(source: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative number`);
  }
  return value;
}

function parseBackend(value: string, where: string): BackendChoice {
  const match = BACKENDS.find((backend) => backend === value);
  if (!match) {
    throw new ConfigError(`${where} must be one of ${BACKENDS.join(', ')}, got "${value}"`);
  }
  return match;
}

function parseSettleMode(value: string, where: string): SettleMode {
  const match = SETTLE_MODES.find((mode) => mode === value);
  if (!match) {
    throw new ConfigError(`${where} must be one of ${SETTLE_MODES.join(', ')}, got "${value}"`);
  }
  return match;
}

function parseSessionName(value: string, where: string): string {
  if (!SESSION_NAME.test(value)) {
    throw new ConfigError(`${where} may only contain letters, digits, "_", "." and "-"`);
  }
  return value;
}

function parseReadiness(raw: unknown, where: string): ReadinessProbeSpec {
  if (!isRecord(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const timing = {
    retries: optionalNumber(raw, 'retries', where),
    initialDelay: optionalNumber(raw, 'initialDelay', where),
    maxDelay: optionalNumber(raw, 'maxDelay', where),
  };
  if (raw.type === 'tcp') {
    const host = optionalString(raw, 'host', where);
    const port = raw.port;
    if (!host || (typeof port !== 'string' && typeof port !== 'number')) {
      throw new ConfigError(`${where} of type tcp needs host and port`);
    }
    return { type: 'tcp', host, port, ...timing };
  }
  if (raw.type === 'http') {
    const url = optionalString(raw, 'url', where);
    if (!url) {
      throw new ConfigError(`${where} of type http needs url`);
    }
    return { type: 'http', url, ...timing };
  }
  throw new ConfigError(`${where}.type must be "tcp" or "http"`);
}

function parseEnv(raw: unknown, where: string): Record<string, string> {
  if (!isRecord(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }
  const env: Record<string, string> = {};
  for (const [ key, value ] of Object.entries(raw)) {
    if (!ENV_NAME.test(key)) {
      throw new ConfigError(`${where}: "${key}" is not a valid variable name`);
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ConfigError(`${where}.${key} must be a string or number`);
    }
    env[key] = String(value);
  }
  return env;
}

function parseService(raw: unknown, index: number, earlier: ServiceSpec[]): ServiceSpec {
  const where = `services[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const name = optionalString(raw, 'name', where);
  if (!name) {
    throw new ConfigError(`${where}.name is required`);
  }
  if (earlier.some((service) => service.name === name)) {
    throw new ConfigError(`${where}: duplicate service name "${name}"`);
  }

  const command = raw.command;
  if (!Array.isArray(command) || command.length === 0 || !command.every((part) => typeof part === 'string' && part.length > 0)) {
    throw new ConfigError(`${where}.command must be a non-empty array of strings`);
  }

  const windowIndex = optionalNumber(raw, 'windowIndex', where) ?? index;
  if (windowIndex !== index) {
    throw new ConfigError(`${where}.windowIndex must equal its position (${index}), got ${windowIndex}`);
  }

  const dependsOn = optionalString(raw, 'dependsOn', where);
  if (dependsOn && !earlier.some((service) => service.name === dependsOn)) {
    throw new ConfigError(`${where}.dependsOn "${dependsOn}" must name a service declared before "${name}"`);
  }

  const service: ServiceSpec = {
    name,
    command: command.map(String),
    windowIndex,
    settleDelay: optionalNumber(raw, 'settleDelay', where) ?? 0,
  };
  if (dependsOn) {
    service.dependsOn = dependsOn;
  }
  const cwd = optionalString(raw, 'cwd', where);
  if (cwd) {
    service.cwd = cwd;
  }
  if (raw.env !== undefined) {
    service.env = parseEnv(raw.env, `${where}.env`);
  }
  if (raw.readiness !== undefined) {
    service.readiness = parseReadiness(raw.readiness, `${where}.readiness`);
  }
  return service;
}

/**
 * Validates a parsed config document. Missing sections fall back to the defaults.
 */
export function parseConfig(raw: unknown, workingRoot: string): OrchestrationConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config root must be an object');
  }
  const config = defaultConfig(workingRoot);

  const sessionName = optionalString(raw, 'sessionName', 'config');
  if (sessionName) {
    config.sessionName = parseSessionName(sessionName, 'config.sessionName');
  }
  const backend = optionalString(raw, 'backend', 'config');
  if (backend) {
    config.backend = parseBackend(backend, 'config.backend');
  }
  const envFile = optionalString(raw, 'envFile', 'config');
  if (envFile) {
    config.envFile = envFile;
  }

  if (raw.environment !== undefined) {
    if (!isRecord(raw.environment)) {
      throw new ConfigError('config.environment must be an object');
    }
    config.environment = {
      rootPath: optionalString(raw.environment, 'rootPath', 'config.environment') ?? config.environment.rootPath,
      manifestPath: optionalString(raw.environment, 'manifestPath', 'config.environment') ?? config.environment.manifestPath,
      interpreter: optionalString(raw.environment, 'interpreter', 'config.environment') ?? config.environment.interpreter,
    };
  }

  if (raw.settle !== undefined) {
    if (!isRecord(raw.settle)) {
      throw new ConfigError('config.settle must be an object');
    }
    const mode = optionalString(raw.settle, 'mode', 'config.settle');
    if (mode) {
      config.settle = { mode: parseSettleMode(mode, 'config.settle.mode') };
    }
  }

  if (raw.services !== undefined) {
    if (!Array.isArray(raw.services) || raw.services.length === 0) {
      throw new ConfigError('config.services must be a non-empty array');
    }
    const services: ServiceSpec[] = [];
    raw.services.forEach((entry: unknown, index: number) => {
      services.push(parseService(entry, index, services));
    });
    config.services = services;
  }

  return config;
}

function applyOverrides(config: OrchestrationConfig, overrides: ConfigOverrides, env: NodeJS.ProcessEnv): void {
  const backend = overrides.backend ?? env.GAME_STACK_BACKEND;
  if (backend) {
    config.backend = parseBackend(backend, 'backend');
  }
  const sessionName = overrides.sessionName ?? env.GAME_STACK_SESSION;
  if (sessionName) {
    config.sessionName = parseSessionName(sessionName, 'session');
  }
  if (overrides.settle) {
    config.settle = { mode: parseSettleMode(overrides.settle, 'settle') };
  }
}

/**
 * Loads the launcher config from disk (or the built-in defaults), then applies
 * `GAME_STACK_*` variables and command-line overrides, in that order of precedence.
 */
export function loadOrchestrationConfig(options: LoadConfigOptions = {}): OrchestrationConfig {
  const workingRoot = path.resolve(options.workingRoot ?? process.cwd());
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(workingRoot, options.configPath ?? DEFAULT_CONFIG_PATH);

  let config: OrchestrationConfig;
  if (fs.existsSync(configPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error: unknown) {
      throw new ConfigError(`Cannot parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    config = parseConfig(raw, workingRoot);
    logger.debug(`Loaded config from ${configPath}`);
  } else if (explicit) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  } else {
    logger.debug(`No ${DEFAULT_CONFIG_PATH} found, using built-in defaults`);
    config = defaultConfig(workingRoot);
  }

  applyOverrides(config, options.overrides ?? {}, options.env ?? process.env);
  return config;
}

/**
 * Loads the services' env file into this process so every window inherits it.
 * Returns the keys it defined, or undefined when the file does not exist.
 */
export function loadEnvFile(config: OrchestrationConfig): string[] | undefined {
  const envPath = path.resolve(config.workingRoot, config.envFile);
  if (!fs.existsSync(envPath)) {
    logger.warn(`Env file not found: ${envPath}`);
    return undefined;
  }
  const result = loadEnv({ path: envPath });
  if (result.error) {
    throw new ConfigError(`Cannot read ${envPath}: ${result.error.message}`);
  }
  return Object.keys(result.parsed ?? {});
}
