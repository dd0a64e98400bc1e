import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { DEMO_API_URL, LIVE_API_URL } from './types.js';
import type { ClientConfig, ClientOptions, ConfigFile } from './types.js';
import { ConfigurationError } from '../errors/index.js';
import logger from './logger.js';

export const DEFAULT_PORT = 8080;
export const DEFAULT_REFRESH_MARGIN_MS = 5_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 5 * 60_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Merge explicit options, environment fallbacks and defaults.
 * Throws ConfigurationError when either credential is missing.
 */
export function resolveClientConfig(
  options: ClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const clientId = options.clientId || env.CLIENT_ID;
  const clientSecret = options.clientSecret || env.CLIENT_SECRET;

  const missing: string[] = [];
  if (!clientId) missing.push('clientId (or CLIENT_ID)');
  if (!clientSecret) missing.push('clientSecret (or CLIENT_SECRET)');
  if (!clientId || !clientSecret) {
    throw new ConfigurationError(`Missing credentials: ${missing.join(', ')}`);
  }

  const demo = options.demo ?? true;

  return {
    clientId,
    clientSecret,
    port: options.port ?? DEFAULT_PORT,
    demo,
    apiUrl: demo ? DEMO_API_URL : LIVE_API_URL,
    refreshMarginMs: options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS,
    authTimeoutMs: options.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS,
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    autoRefresh: options.autoRefresh ?? true,
    openBrowser: options.openBrowser,
  };
}

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Field readers for one YAML file; each throws ConfigurationError naming the bad key
 */
function fieldReader(configPath: string) {
  const invalid = (key: string, expected: string) =>
    new ConfigurationError(`Invalid value for ${key} in ${configPath}: expected ${expected}`);

  const section = (root: Mapping, name: string): Mapping | undefined => {
    const value = root[name];
    if (value === undefined || value === null) return undefined;
    if (!isMapping(value)) throw invalid(name, 'a mapping');
    return value;
  };

  const string = (from: Mapping | undefined, key: string, path: string): string | undefined => {
    const value = from?.[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw invalid(path, 'a string');
    return value;
  };

  const integer = (from: Mapping | undefined, key: string, path: string): number | undefined => {
    const value = from?.[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw invalid(path, 'a non-negative integer');
    }
    return value;
  };

  const boolean = (from: Mapping | undefined, key: string, path: string): boolean | undefined => {
    const value = from?.[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') throw invalid(path, 'true or false');
    return value;
  };

  return { section, string, integer, boolean };
}

/**
 * Read client options from a YAML file.
 */
export function loadConfigFile(configPath: string): ClientOptions {
  let parsed: unknown;
  try {
    const fileContents = readFileSync(configPath, 'utf8');
    parsed = yaml.load(fileContents);
  } catch (error) {
    logger.error({ error, configPath }, 'Failed to load configuration');
    throw new ConfigurationError(`Failed to load configuration from ${configPath}: ${error}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new ConfigurationError(`Configuration in ${configPath} must be a mapping`);
  }

  const read = fieldReader(configPath);
  const client = read.section(parsed, 'client');
  const auth = read.section(parsed, 'auth');
  const http = read.section(parsed, 'http');

  const file: ConfigFile = {
    client: {
      clientId: read.string(client, 'clientId', 'client.clientId'),
      clientSecret: read.string(client, 'clientSecret', 'client.clientSecret'),
      port: read.integer(client, 'port', 'client.port'),
      demo: read.boolean(client, 'demo', 'client.demo'),
    },
    auth: {
      refreshMarginMs: read.integer(auth, 'refreshMarginMs', 'auth.refreshMarginMs'),
      timeoutMs: read.integer(auth, 'timeoutMs', 'auth.timeoutMs'),
      autoRefresh: read.boolean(auth, 'autoRefresh', 'auth.autoRefresh'),
    },
    http: {
      timeoutMs: read.integer(http, 'timeoutMs', 'http.timeoutMs'),
    },
  };
  logger.info({ configPath }, 'Configuration loaded successfully');

  return {
    clientId: file.client?.clientId,
    clientSecret: file.client?.clientSecret,
    port: file.client?.port,
    demo: file.client?.demo,
    refreshMarginMs: file.auth?.refreshMarginMs,
    authTimeoutMs: file.auth?.timeoutMs,
    autoRefresh: file.auth?.autoRefresh,
    requestTimeoutMs: file.http?.timeoutMs,
  };
}
