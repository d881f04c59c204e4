import { ConfigError } from './Errors';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface StoreAddress {
  readonly host: string;
  readonly port: number;
}

export interface ServiceConfig {
  readonly host: string;
  readonly port: number;
  readonly storeAddress: string;
  readonly storePassword: string;
  /** Shared secret for protected routes. Empty disables the authorization gate. */
  readonly authToken: string;
  readonly logLevel: LogLevel;
  /** Largest accepted request body, in the size notation body-parser takes ('1mb', '512kb'). */
  readonly bodyLimit: string;
}

/**
 * Fixed timeouts, in milliseconds. Not configurable at runtime.
 */
export const TIMEOUTS = Object.freeze({
  read: 10_000,
  write: 10_000,
  idle: 120_000,
  keyOperation: 5_000,
  list: 10_000,
  health: 2_000,
  startupProbe: 5_000,
  shutdownGrace: 10_000,
});

export const LIST_LIMITS = Object.freeze({
  default: 100,
  min: 1,
  max: 1000,
});

export const DEFAULT_CONFIG: ServiceConfig = {
  host: '0.0.0.0',
  port: 8080,
  storeAddress: 'localhost:6379',
  storePassword: '',
  authToken: '',
  logLevel: 'info',
  bodyLimit: '1mb',
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Split a `host:port` store address. IPv6 hosts are written in brackets: `[::1]:6379`.
 */
export function parseStoreAddress(address: string): StoreAddress {
  const separator = address.lastIndexOf(':');
  if (separator <= 0 || separator === address.length - 1) {
    throw new ConfigError(`Invalid store address: ${address}. Expected host:port`);
  }

  let host = address.slice(0, separator);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  const portText = address.slice(separator + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid store port in address: ${address}`);
  }

  return { host, port };
}

export function resolveConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  const resolved: ServiceConfig = { ...DEFAULT_CONFIG, ...overrides };

  if (!Number.isInteger(resolved.port) || resolved.port < 0 || resolved.port > 65535) {
    throw new ConfigError(`port must be an integer between 0 and 65535, got ${resolved.port}`);
  }
  if (!isLogLevel(resolved.logLevel)) {
    throw new ConfigError(`Invalid log level: ${resolved.logLevel}`);
  }
  if (resolved.bodyLimit.length === 0) {
    throw new ConfigError('bodyLimit must not be empty');
  }
  parseStoreAddress(resolved.storeAddress);

  return Object.freeze(resolved);
}
