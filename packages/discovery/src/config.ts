/**
 * Configuration loader — reads toolscout.yaml and applies environment overrides.
 *
 * Handles:
 * - YAML parsing (a missing file means "all defaults")
 * - Seconds in the file / environment, milliseconds in memory
 * - MCP_* environment overrides, ignoring values that are not numbers
 * - Validation of port ranges and timeouts
 */

import * as fs from 'node:fs';
import { parse as parseYAML } from 'yaml';
import { isJsonObject } from '@toolscout/shared';
import type { JsonObject } from '@toolscout/shared';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DISCOVERY_TIMEOUT = 60;
export const DISCOVERY_RETRIES = 3;
export const DISCOVERY_RETRY_SLEEP = 5;
export const COMMAND_DISCOVERY_TIMEOUT = 15;
export const CONNECTION_TIMEOUT = 30;
export const CONTAINER_HEALTH_CHECK_TIMEOUT = 15;
export const POD_READY_TIMEOUT = 60;
export const CONTAINER_PORT_RANGE: PortRange = { start: 8000, end: 9000 };
export const SERVICE_PORT_RANGE: PortRange = { start: 8000, end: 9000 };
export const CLEANUP_MAX_RETRIES = 3;

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/** Half-open port range [start, end). */
export interface PortRange {
  start: number;
  end: number;
}

export interface CleanupConfig {
  /** Bound on the synchronous removal attempt. */
  removeTimeoutMs: number;
  maxRetries: number;
  /** First background retry delay; doubles on every retry. */
  baseDelayMs: number;
}

export interface DockerProbeConfig {
  socketPath: string;
  healthCheckTimeoutMs: number;
  portRange: PortRange;
  /** Port the server listens on inside the container (http transport). */
  containerPort: number;
  httpPath: string;
}

export interface KubernetesProbeConfig {
  namespace: string;
  podReadyTimeoutMs: number;
  servicePortRange: PortRange;
  clusterDomain: string;
  httpPath: string;
}

export interface ToolscoutConfig {
  discovery: {
    timeoutMs: number;
    retries: number;
    retrySleepMs: number;
    commandTimeoutMs: number;
    connectionTimeoutMs: number;
  };
  cleanup: CleanupConfig;
  docker: DockerProbeConfig;
  kubernetes: KubernetesProbeConfig;
}

export function defaultConfig(): ToolscoutConfig {
  return {
    discovery: {
      timeoutMs: DISCOVERY_TIMEOUT * 1000,
      retries: DISCOVERY_RETRIES,
      retrySleepMs: DISCOVERY_RETRY_SLEEP * 1000,
      commandTimeoutMs: COMMAND_DISCOVERY_TIMEOUT * 1000,
      connectionTimeoutMs: CONNECTION_TIMEOUT * 1000,
    },
    cleanup: {
      removeTimeoutMs: 10_000,
      maxRetries: CLEANUP_MAX_RETRIES,
      baseDelayMs: 1000,
    },
    docker: {
      socketPath: '/var/run/docker.sock',
      healthCheckTimeoutMs: CONTAINER_HEALTH_CHECK_TIMEOUT * 1000,
      portRange: { ...CONTAINER_PORT_RANGE },
      containerPort: 8000,
      httpPath: '/mcp',
    },
    kubernetes: {
      namespace: 'mcp-servers',
      podReadyTimeoutMs: POD_READY_TIMEOUT * 1000,
      servicePortRange: { ...SERVICE_PORT_RANGE },
      clusterDomain: 'svc.cluster.local',
      httpPath: '/mcp',
    },
  };
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG_PATH = 'config/toolscout.yaml';

/**
 * Load the toolscout configuration.
 *
 * Precedence: defaults < YAML file < environment variables.
 * An explicit configPath that does not exist is an error; the default
 * path is optional.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ToolscoutConfig {
  const explicitPath = configPath ?? env['TOOLSCOUT_CONFIG'];
  const filePath = explicitPath ?? DEFAULT_CONFIG_PATH;
  const config = defaultConfig();

  if (fs.existsSync(filePath)) {
    console.log(`[config] Loading configuration from ${filePath}`);
    const raw: unknown = parseYAML(fs.readFileSync(filePath, 'utf-8'));
    if (raw !== null && raw !== undefined) {
      if (!isJsonObject(raw)) {
        throw new Error(`Configuration file must contain a mapping: ${filePath}`);
      }
      applyFile(config, raw);
    }
  } else if (explicitPath) {
    throw new Error(`Configuration file not found: ${filePath}`);
  }

  applyEnv(config, env);
  validate(config);

  console.log(
    `[config] Discovery: timeout=${config.discovery.timeoutMs / 1000}s ` +
    `retries=${config.discovery.retries} retrySleep=${config.discovery.retrySleepMs / 1000}s`,
  );
  console.log(
    `[config] Docker: ports=[${config.docker.portRange.start},${config.docker.portRange.end}) ` +
    `healthCheck=${config.docker.healthCheckTimeoutMs / 1000}s`,
  );
  console.log(
    `[config] Kubernetes: namespace=${config.kubernetes.namespace} ` +
    `podReady=${config.kubernetes.podReadyTimeoutMs / 1000}s`,
  );

  return config;
}

function applyFile(config: ToolscoutConfig, raw: JsonObject): void {
  const discovery = section(raw, 'discovery');
  config.discovery.timeoutMs = seconds(discovery, 'timeout', config.discovery.timeoutMs);
  config.discovery.retries = integer(discovery, 'retries', config.discovery.retries);
  config.discovery.retrySleepMs = seconds(discovery, 'retrySleep', config.discovery.retrySleepMs);
  config.discovery.commandTimeoutMs = seconds(discovery, 'commandTimeout', config.discovery.commandTimeoutMs);
  config.discovery.connectionTimeoutMs = seconds(discovery, 'connectionTimeout', config.discovery.connectionTimeoutMs);

  const cleanup = section(raw, 'cleanup');
  config.cleanup.removeTimeoutMs = seconds(cleanup, 'removeTimeout', config.cleanup.removeTimeoutMs);
  config.cleanup.maxRetries = integer(cleanup, 'maxRetries', config.cleanup.maxRetries);
  config.cleanup.baseDelayMs = seconds(cleanup, 'baseDelay', config.cleanup.baseDelayMs);

  const docker = section(raw, 'docker');
  config.docker.socketPath = text(docker, 'socketPath', config.docker.socketPath);
  config.docker.healthCheckTimeoutMs = seconds(docker, 'healthCheckTimeout', config.docker.healthCheckTimeoutMs);
  config.docker.portRange = portRange(docker, 'portRange', config.docker.portRange);
  config.docker.containerPort = integer(docker, 'containerPort', config.docker.containerPort);
  config.docker.httpPath = text(docker, 'httpPath', config.docker.httpPath);

  const kubernetes = section(raw, 'kubernetes');
  config.kubernetes.namespace = text(kubernetes, 'namespace', config.kubernetes.namespace);
  config.kubernetes.podReadyTimeoutMs = seconds(kubernetes, 'podReadyTimeout', config.kubernetes.podReadyTimeoutMs);
  config.kubernetes.servicePortRange = portRange(kubernetes, 'servicePortRange', config.kubernetes.servicePortRange);
  config.kubernetes.clusterDomain = text(kubernetes, 'clusterDomain', config.kubernetes.clusterDomain);
  config.kubernetes.httpPath = text(kubernetes, 'httpPath', config.kubernetes.httpPath);
}

function applyEnv(config: ToolscoutConfig, env: NodeJS.ProcessEnv): void {
  config.discovery.timeoutMs = envSeconds(env, 'MCP_DISCOVERY_TIMEOUT', config.discovery.timeoutMs);
  config.discovery.retries = envInteger(env, 'MCP_DISCOVERY_RETRIES', config.discovery.retries);
  config.discovery.retrySleepMs = envSeconds(env, 'MCP_DISCOVERY_RETRY_SLEEP', config.discovery.retrySleepMs);
  config.docker.healthCheckTimeoutMs = envSeconds(
    env,
    'MCP_CONTAINER_HEALTH_CHECK_TIMEOUT',
    config.docker.healthCheckTimeoutMs,
  );
  config.kubernetes.podReadyTimeoutMs = envSeconds(env, 'MCP_POD_READY_TIMEOUT', config.kubernetes.podReadyTimeoutMs);

  const namespace = env['MCP_K8S_NAMESPACE'];
  if (namespace) config.kubernetes.namespace = namespace;
  const socketPath = env['DOCKER_SOCKET'];
  if (socketPath) config.docker.socketPath = socketPath;
}

function validate(config: ToolscoutConfig): void {
  const timeouts: Array<[string, number]> = [
    ['discovery.timeout', config.discovery.timeoutMs],
    ['discovery.commandTimeout', config.discovery.commandTimeoutMs],
    ['discovery.connectionTimeout', config.discovery.connectionTimeoutMs],
    ['cleanup.removeTimeout', config.cleanup.removeTimeoutMs],
    ['docker.healthCheckTimeout', config.docker.healthCheckTimeoutMs],
    ['kubernetes.podReadyTimeout', config.kubernetes.podReadyTimeoutMs],
  ];
  for (const [name, value] of timeouts) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Configuration invalid: ${name} must be positive`);
    }
  }
  if (config.discovery.retries < 1) {
    throw new Error('Configuration invalid: discovery.retries must be at least 1');
  }
  if (config.cleanup.maxRetries < 0) {
    throw new Error('Configuration invalid: cleanup.maxRetries must not be negative');
  }
  checkRange('docker.portRange', config.docker.portRange);
  checkRange('kubernetes.servicePortRange', config.kubernetes.servicePortRange);
}

function checkRange(name: string, range: PortRange): void {
  const { start, end } = range;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end > 65536 || start >= end) {
    throw new Error(`Configuration invalid: ${name} must satisfy 1 <= start < end <= 65536`);
  }
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function section(raw: JsonObject, key: string): JsonObject {
  const value = raw[key];
  return isJsonObject(value) ? value : {};
}

function seconds(raw: JsonObject, key: string, fallbackMs: number): number {
  const value = raw[key];
  return typeof value === 'number' ? Math.round(value * 1000) : fallbackMs;
}

function integer(raw: JsonObject, key: string, fallback: number): number {
  const value = raw[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
}

function text(raw: JsonObject, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' && value ? value : fallback;
}

function portRange(raw: JsonObject, key: string, fallback: PortRange): PortRange {
  const value = raw[key];
  if (Array.isArray(value) && value.length === 2) {
    const [start, end] = value;
    if (typeof start === 'number' && typeof end === 'number') return { start, end };
  }
  return fallback;
}

function envSeconds(env: NodeJS.ProcessEnv, name: string, fallbackMs: number): number {
  const value = envNumber(env, name);
  return value === null ? fallbackMs : Math.round(value * 1000);
}

function envInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = envNumber(env, name);
  if (value === null) return fallback;
  if (!Number.isInteger(value)) {
    console.warn(`[config] WARNING: ${name}=${value} is not an integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[config] WARNING: ${name}="${raw}" is not a number, ignoring`);
    return null;
  }
  return value;
}
