import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { homedir, hostname } from 'node:os';

/**
 * Transport configuration. Durations are in seconds.
 */
export interface TransportConfig {
  /** Port of the point-to-point message endpoint */
  port: number;
  /** UDP port used for discovery probes */
  broadcastPort: number;
  /** Shared secret for frame encryption */
  encryptionKey?: string;
  /** Hex PKCS#8 Ed25519 private key used to sign frames */
  signingKey?: string;
  discoveryTimeout: number;
  connectionTimeout: number;
  heartbeatInterval: number;
  /** Largest frame accepted or sent, in bytes */
  maxMessageSize: number;
  enableCompression: boolean;
  /** This node's identifier */
  nodeId: string;
  /** Bind to this network interface only (e.g. 'eth0') */
  networkInterface?: string;
  /** Feature tags advertised in discovery replies */
  capabilities: string[];
}

export type TransportOptions = Partial<TransportConfig>;

/**
 * Built-in defaults, before environment and explicit options.
 */
export function defaultTransportConfig(): TransportConfig {
  return {
    port: 9999,
    broadcastPort: 9998,
    discoveryTimeout: 5,
    connectionTimeout: 10,
    heartbeatInterval: 30,
    maxMessageSize: 1048576,
    enableCompression: false,
    nodeId: hostname(),
    capabilities: [],
  };
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`Invalid config: ${name} must be a number (got '${value}')`);
  }
  return parsed;
}

/**
 * Read LANMESH_* environment variables into options.
 * Unset variables are left out so defaults still apply.
 */
export function transportOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): TransportOptions {
  const options: TransportOptions = {};

  if (env.LANMESH_PORT) options.port = parseNumber('LANMESH_PORT', env.LANMESH_PORT);
  if (env.LANMESH_BROADCAST_PORT) options.broadcastPort = parseNumber('LANMESH_BROADCAST_PORT', env.LANMESH_BROADCAST_PORT);
  if (env.LANMESH_ENCRYPTION_KEY) options.encryptionKey = env.LANMESH_ENCRYPTION_KEY;
  if (env.LANMESH_SIGNING_KEY) options.signingKey = env.LANMESH_SIGNING_KEY;
  if (env.LANMESH_DISCOVERY_TIMEOUT) options.discoveryTimeout = parseNumber('LANMESH_DISCOVERY_TIMEOUT', env.LANMESH_DISCOVERY_TIMEOUT);
  if (env.LANMESH_CONNECTION_TIMEOUT) options.connectionTimeout = parseNumber('LANMESH_CONNECTION_TIMEOUT', env.LANMESH_CONNECTION_TIMEOUT);
  if (env.LANMESH_HEARTBEAT_INTERVAL) options.heartbeatInterval = parseNumber('LANMESH_HEARTBEAT_INTERVAL', env.LANMESH_HEARTBEAT_INTERVAL);
  if (env.LANMESH_MAX_MESSAGE_SIZE) options.maxMessageSize = parseNumber('LANMESH_MAX_MESSAGE_SIZE', env.LANMESH_MAX_MESSAGE_SIZE);
  if (env.LANMESH_ENABLE_COMPRESSION !== undefined) options.enableCompression = env.LANMESH_ENABLE_COMPRESSION === 'true';
  if (env.LANMESH_NODE_ID) options.nodeId = env.LANMESH_NODE_ID;
  if (env.LANMESH_NETWORK_INTERFACE) options.networkInterface = env.LANMESH_NETWORK_INTERFACE;
  if (env.LANMESH_CAPABILITIES) {
    options.capabilities = env.LANMESH_CAPABILITIES.split(',').map(cap => cap.trim()).filter(cap => cap !== '');
  }

  return options;
}

function assertPort(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`Invalid config: ${name} must be an integer between 0 and 65535`);
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid config: ${name} must be a positive number`);
  }
}

/**
 * Check a complete configuration.
 *
 * @throws Error naming the first invalid field
 */
export function validateTransportConfig(config: TransportConfig): TransportConfig {
  assertPort('port', config.port);
  assertPort('broadcastPort', config.broadcastPort);
  assertPositive('discoveryTimeout', config.discoveryTimeout);
  assertPositive('connectionTimeout', config.connectionTimeout);
  assertPositive('heartbeatInterval', config.heartbeatInterval);
  assertPositive('maxMessageSize', config.maxMessageSize);
  if (!Number.isInteger(config.maxMessageSize)) {
    throw new Error('Invalid config: maxMessageSize must be an integer');
  }
  if (typeof config.nodeId !== 'string' || config.nodeId.trim() === '') {
    throw new Error('Invalid config: nodeId must be a non-empty string');
  }
  return config;
}

/**
 * Resolve the effective configuration.
 * Priority order: explicit options, then LANMESH_* environment, then defaults.
 *
 * @param options - Values supplied by the caller
 * @param env - Environment to read; defaults to process.env
 * @returns Validated configuration
 */
export function resolveTransportConfig(
  options: TransportOptions = {},
  env: NodeJS.ProcessEnv = process.env
): TransportConfig {
  const explicit: TransportOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(explicit, { [key]: value });
    }
  }

  return validateTransportConfig({
    ...defaultTransportConfig(),
    ...transportOptionsFromEnv(env),
    ...explicit,
  });
}

/**
 * Default config file path: LANMESH_CONFIG env or ~/.config/lanmesh/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.LANMESH_CONFIG) {
    return resolve(process.env.LANMESH_CONFIG);
  }
  return resolve(homedir(), '.config', 'lanmesh', 'config.json');
}

/**
 * Pick the recognized, well-typed fields out of a parsed config file.
 */
function parseConfig(config: Record<string, unknown>): TransportOptions {
  const options: TransportOptions = {};

  const numberFields = [
    'port',
    'broadcastPort',
    'discoveryTimeout',
    'connectionTimeout',
    'heartbeatInterval',
    'maxMessageSize',
  ] as const;
  for (const field of numberFields) {
    const value = config[field];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new Error(`Invalid config: ${field} must be a number`);
    }
    options[field] = value;
  }

  const stringFields = ['encryptionKey', 'signingKey', 'nodeId', 'networkInterface'] as const;
  for (const field of stringFields) {
    const value = config[field];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new Error(`Invalid config: ${field} must be a string`);
    }
    options[field] = value;
  }

  if (config.enableCompression !== undefined) {
    if (typeof config.enableCompression !== 'boolean') {
      throw new Error('Invalid config: enableCompression must be a boolean');
    }
    options.enableCompression = config.enableCompression;
  }

  if (config.capabilities !== undefined) {
    const caps = config.capabilities;
    if (!Array.isArray(caps) || !caps.every((cap): cap is string => typeof cap === 'string')) {
      throw new Error('Invalid config: capabilities must be an array of strings');
    }
    options.capabilities = caps;
  }

  return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(content: string, configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file: ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load transport options from a JSON file (sync).
 * The result still goes through resolveTransportConfig to pick up env and defaults.
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if the file doesn't exist or holds invalid values
 */
export function loadTransportConfig(path?: string): TransportOptions {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found at ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  return parseConfig(parseJsonObject(content, configPath));
}

/**
 * Load transport options from a JSON file (async).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if the file doesn't exist or holds invalid values
 */
export async function loadTransportConfigAsync(path?: string): Promise<TransportOptions> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new Error(`Config file not found at ${configPath}`);
    }
    throw err;
  }

  return parseConfig(parseJsonObject(content, configPath));
}
