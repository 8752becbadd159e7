/**
 * Base class for every error raised by an {@link InstrumentLink}.
 *
 * `endpoint` is the `host:port` the link was talking to.
 */
export class ScpiLinkError extends Error {
  constructor(
    message: string,
    readonly endpoint: string,
    options?: { cause?: unknown },
  ) {
    super(`${message} (${endpoint})`, options);
    this.name = 'ScpiLinkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * TCP handshake failed, was refused or did not complete within the timeout.
 */
export class ConnectionError extends ScpiLinkError {
  constructor(message: string, endpoint: string, options?: { cause?: unknown }) {
    super(message, endpoint, options);
    this.name = 'ConnectionError';
  }
}

/**
 * `connect()` was called on a link that is connecting or connected.
 */
export class AlreadyConnectedError extends ScpiLinkError {
  constructor(message: string, endpoint: string) {
    super(message, endpoint);
    this.name = 'AlreadyConnectedError';
  }
}

/**
 * A command was issued on a link that holds no open socket.
 */
export class NotConnectedError extends ScpiLinkError {
  constructor(message: string, endpoint: string) {
    super(message, endpoint);
    this.name = 'NotConnectedError';
  }
}

/**
 * Write or read on an established socket failed, or the instrument closed
 * the connection before a full response line arrived.
 */
export class TransportError extends ScpiLinkError {
  constructor(message: string, endpoint: string, options?: { cause?: unknown }) {
    super(message, endpoint, options);
    this.name = 'TransportError';
  }
}

/**
 * No line terminator arrived within `timeout` milliseconds of sending
 * `command`.
 */
export class TimeoutError extends ScpiLinkError {
  constructor(
    readonly command: string,
    readonly timeout: number,
    endpoint: string,
  ) {
    super(
      `no response to ${JSON.stringify(command)} within ${timeout}ms`,
      endpoint,
    );
    this.name = 'TimeoutError';
  }
}
