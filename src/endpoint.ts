import type log from 'loglevel';
import type { MarkRequired } from 'ts-essentials';

import type { Logger } from './logger';

export interface EndpointOptions {
  /** Instrument IP address or hostname. */
  host: string;
  /** SCPI socket port. */
  port: number;
  /**
   * Connect, write and response timeout in milliseconds.
   * @defaultValue 10000
   */
  timeout?: number;
  /**
   * Appended to every command and expected at the end of every response.
   * @defaultValue `'\n'`
   */
  terminator?: string;
}

export interface InstrumentLinkOptions extends EndpointOptions {
  /**
   * Pause in milliseconds after each command is written, for instruments
   * that drop input arriving while they are still processing.
   * @defaultValue 0
   */
  commandDelay?: number;
  /**
   * Receives all of the link's log output instead of the shared `scpi-link`
   * loglevel logger.
   */
  logger?: Logger;
  /**
   * Level of the shared `scpi-link` loglevel logger. Process-wide: it applies
   * to every link without an injected `logger`. Ignored when `logger` is set.
   */
  logLevel?: log.LogLevelDesc;
}

export type Endpoint = Readonly<
  MarkRequired<EndpointOptions, 'timeout' | 'terminator'>
>;

export const DEFAULT_TIMEOUT = 10000;
export const DEFAULT_TERMINATOR = '\n';

export function assertHost(host: unknown, context: string): void {
  if (typeof host !== 'string' || host.trim().length === 0) {
    throw new TypeError(`${context}: host is required`);
  }
}

export function assertPort(port: unknown, context: string): void {
  if (
    typeof port !== 'number' ||
    !Number.isInteger(port) ||
    port < 1 ||
    port > 65535
  ) {
    throw new TypeError(
      `${context}: port must be an integer between 1 and 65535, got ${String(port)}`,
    );
  }
}

export function assertTimeout(timeout: unknown, context: string): void {
  if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
    throw new TypeError(
      `${context}: timeout must be a positive number of milliseconds, got ${String(timeout)}`,
    );
  }
}

function assertTerminator(terminator: unknown, context: string): void {
  if (typeof terminator !== 'string' || terminator.length === 0) {
    throw new TypeError(`${context}: terminator must be a non-empty string`);
  }
}

function assertCommandDelay(commandDelay: unknown, context: string): void {
  if (
    typeof commandDelay !== 'number' ||
    !Number.isFinite(commandDelay) ||
    commandDelay < 0
  ) {
    throw new TypeError(
      `${context}: commandDelay must be zero or a positive number of milliseconds`,
    );
  }
}

/**
 * Validates `options` and fills in defaults. The result is frozen.
 * @throws TypeError when an option is missing or out of range
 */
export function normalizeEndpoint(
  options: EndpointOptions,
  context = 'endpoint options',
): Endpoint {
  const {
    host,
    port,
    timeout = DEFAULT_TIMEOUT,
    terminator = DEFAULT_TERMINATOR,
  } = options;

  assertHost(host, context);
  assertPort(port, context);
  assertTimeout(timeout, context);
  assertTerminator(terminator, context);

  return Object.freeze({ host: host.trim(), port, timeout, terminator });
}

export function normalizeLinkOptions(
  options: Omit<InstrumentLinkOptions, 'logger' | 'logLevel'>,
  context = 'link options',
): { endpoint: Endpoint; commandDelay: number } {
  const { commandDelay = 0, ...endpointOptions } = options;
  assertCommandDelay(commandDelay, context);
  return {
    endpoint: normalizeEndpoint(endpointOptions, context),
    commandDelay,
  };
}

export function describeEndpoint(endpoint: Pick<Endpoint, 'host' | 'port'>): string {
  return endpoint.host.includes(':')
    ? `[${endpoint.host}]:${endpoint.port}`
    : `${endpoint.host}:${endpoint.port}`;
}
