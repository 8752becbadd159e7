import castArray from 'lodash.castarray';
import net from 'net';
import Queue from 'promise-queue';
import { setTimeout as delay } from 'timers/promises';

import {
  assertTimeout,
  describeEndpoint,
  normalizeLinkOptions,
  type Endpoint,
  type InstrumentLinkOptions,
} from './endpoint';
import {
  AlreadyConnectedError,
  ConnectionError,
  NotConnectedError,
  TimeoutError,
  TransportError,
} from './errors';
import createLogger, { type Logger } from './logger';
import LineReader from './network/line-reader';

export type LinkState = 'disconnected' | 'connecting' | 'connected';

export interface LinkSendOptions {
  /**
   * Overrides the endpoint timeout for this call, in milliseconds. For a
   * query it bounds the whole exchange: write, command delay and response.
   */
  timeout?: number;
}

type PendingRead = {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
};

/**
 * One TCP connection to one SCPI instrument.
 *
 * Commands are written as `<command><terminator>`; {@link InstrumentLink#query}
 * then waits for one `<response><terminator>` line. Calls on the same link are
 * run one at a time, in the order they were made, so each query gets its own
 * response even when the caller does not await in between.
 *
 * @example
 * ```ts
 * const identity = await withInstrumentLink(
 *   { host: '192.168.1.2', port: 2288 },
 *   async (link) => {
 *     await link.send('*RST');
 *     return link.query('*IDN?');
 *   },
 * );
 * ```
 */
export default class InstrumentLink {
  readonly endpoint: Endpoint;

  readonly commandDelay: number;

  log: Logger;

  private readonly queue = new Queue(1, Infinity);

  private readonly reader: LineReader;

  private socket?: net.Socket;

  private socketClosed?: Promise<void>;

  private pendingRead?: PendingRead;

  /** Responses still owed to queries that already timed out. */
  private abandonedResponses = 0;

  private stateValue: LinkState = 'disconnected';

  constructor(options: InstrumentLinkOptions) {
    const { logger, logLevel, ...linkOptions } = options;

    this.log = createLogger({ logger, level: logLevel });

    const { endpoint, commandDelay } = normalizeLinkOptions(
      linkOptions,
      'instrument link options',
    );
    this.endpoint = endpoint;
    this.commandDelay = commandDelay;
    this.reader = new LineReader(endpoint.terminator);

    this.log.debug('link.constructor(%j)', {
      ...endpoint,
      commandDelay,
    });
  }

  /**
   * `host:port` of the instrument.
   */
  get description(): string {
    return describeEndpoint(this.endpoint);
  }

  get state(): LinkState {
    return this.stateValue;
  }

  get connected(): boolean {
    return this.stateValue === 'connected';
  }

  /**
   * Opens the TCP connection.
   * @throws {@link AlreadyConnectedError} if the link is connecting or connected
   * @throws {@link ConnectionError} if the handshake fails or times out
   */
  async connect(): Promise<void> {
    if (this.socket !== undefined) {
      throw new AlreadyConnectedError(
        `link is already ${this.stateValue}`,
        this.description,
      );
    }

    const { host, port, timeout } = this.endpoint;
    this.log.debug('[%s] link.connect()', this.description);

    const socket = new net.Socket();
    this.socket = socket;
    this.stateValue = 'connecting';
    this.reader.clear();
    this.abandonedResponses = 0;
    this.socketClosed = new Promise((resolve) => {
      socket.once('close', () => resolve());
    });
    socket.on('data', (chunk: Buffer) => this.handleData(socket, chunk));
    socket.on('error', (error) => this.handleSocketError(socket, error));
    socket.on('close', () => this.handleSocketClose(socket));

    try {
      await new Promise<void>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined;

        const onError = (error: Error): void => {
          cleanup();
          reject(
            new ConnectionError(
              `failed to connect: ${error.message}`,
              this.description,
              { cause: error },
            ),
          );
        };
        const onClose = (): void => {
          cleanup();
          reject(
            new ConnectionError(
              'socket closed before the connection was established',
              this.description,
            ),
          );
        };
        const cleanup = (): void => {
          clearTimeout(timer);
          socket.off('error', onError);
          socket.off('close', onClose);
        };

        timer = setTimeout(() => {
          cleanup();
          reject(
            new ConnectionError(
              `connection timed out after ${timeout}ms`,
              this.description,
            ),
          );
        }, timeout);
        socket.once('error', onError);
        socket.once('close', onClose);
        socket.connect(port, host, () => {
          cleanup();
          resolve();
        });
      });
    } catch (error) {
      this.log.error('[%s] link.connect() %s', this.description, error);
      this.releaseSocket(socket);
      socket.destroy();
      throw error;
    }

    socket.setNoDelay(true);
    this.stateValue = 'connected';
    this.log.debug('[%s] link connected', this.description);
  }

  /**
   * Writes each command followed by the terminator. An array is written one
   * line per command, in order.
   * @throws {@link NotConnectedError}
   * @throws {@link TransportError}
   */
  async send(
    command: string | string[],
    sendOptions: LinkSendOptions = {},
  ): Promise<void> {
    const timeout = this.resolveTimeout(sendOptions);
    const commands = castArray(command);

    return this.queue.add(async () => {
      try {
        for (const line of commands) {
          // eslint-disable-next-line no-await-in-loop
          await this.write(line, timeout);
        }
      } catch (err) {
        this.log.error('[%s] link.send() %s', this.description, err);
        throw err;
      }
    });
  }

  /**
   * Writes `command` and resolves with the next response line, terminator
   * stripped. If an earlier query timed out, its late response is discarded
   * when it arrives rather than returned here.
   * @throws {@link NotConnectedError}
   * @throws {@link TransportError}
   * @throws {@link TimeoutError} if no terminator arrives within the timeout
   */
  async query(
    command: string,
    sendOptions: LinkSendOptions = {},
  ): Promise<string> {
    const timeout = this.resolveTimeout(sendOptions);

    return this.queue.add(async () => {
      const deadline = Date.now() + timeout;
      try {
        await this.write(command, timeout);
        const response = await this.readLine(
          command,
          timeout,
          deadline - Date.now(),
        );
        this.log.debug(
          '[%s] link.query(%j) response: %j',
          this.description,
          command,
          response,
        );
        return response;
      } catch (err) {
        this.log.error('[%s] link.query(%j) %s', this.description, command, err);
        throw err;
      }
    });
  }

  /**
   * Closes the socket and resolves once it is closed. Never rejects; does
   * nothing when already disconnected. A query still waiting for its
   * response is rejected with {@link TransportError}, and any unread bytes
   * are dropped.
   */
  async disconnect(): Promise<void> {
    const { socket, socketClosed } = this;
    if (socket === undefined) return;

    this.log.debug('[%s] link.disconnect()', this.description);
    this.releaseSocket(socket);
    this.reader.clear();
    this.abandonedResponses = 0;

    try {
      socket.destroy();
    } catch (err) {
      this.log.debug('[%s] link.disconnect() %s', this.description, err);
    }
    await socketClosed;
  }

  /**
   * Connects, runs `body` and disconnects, whether `body` resolved or threw.
   * The socket is closed before the returned promise settles.
   */
  async use<T>(body: (link: this) => Promise<T> | T): Promise<T> {
    await this.connect();
    try {
      return await body(this);
    } finally {
      await this.disconnect();
    }
  }

  private resolveTimeout(sendOptions: LinkSendOptions): number {
    if (sendOptions.timeout === undefined) return this.endpoint.timeout;
    assertTimeout(sendOptions.timeout, 'send options');
    return sendOptions.timeout;
  }

  private requireSocket(): net.Socket {
    if (this.socket === undefined || this.stateValue !== 'connected') {
      throw new NotConnectedError(
        `link is ${this.stateValue}`,
        this.description,
      );
    }
    return this.socket;
  }

  private async write(command: string, timeout: number): Promise<void> {
    const socket = this.requireSocket();
    this.log.debug('[%s] link.write(%j)', this.description, command);

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new TransportError(
            `write of ${JSON.stringify(command)} did not complete within ${timeout}ms`,
            this.description,
          ),
        );
      }, timeout);

      socket.write(`${command}${this.endpoint.terminator}`, 'utf8', (error) => {
        clearTimeout(timer);
        if (error != null) {
          reject(
            new TransportError(
              `write failed: ${error.message}`,
              this.description,
              { cause: error },
            ),
          );
          return;
        }
        resolve();
      });
    });

    if (this.commandDelay > 0) {
      await delay(this.commandDelay);
    }
  }

  /**
   * Next line that answers the current query, skipping lines owed to
   * queries that already timed out.
   */
  private takeLine(): string | undefined {
    let line = this.reader.readLine();
    while (line !== undefined && this.abandonedResponses > 0) {
      this.abandonedResponses -= 1;
      this.log.debug(
        '[%s] discarded late response: %j',
        this.description,
        line,
      );
      line = this.reader.readLine();
    }
    return line;
  }

  private readLine(
    command: string,
    timeout: number,
    remaining: number,
  ): Promise<string> {
    const buffered = this.takeLine();
    if (buffered !== undefined) return Promise.resolve(buffered);

    if (this.socket === undefined) {
      return Promise.reject(
        new TransportError(
          'connection closed before a response arrived',
          this.description,
        ),
      );
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = undefined;
        this.abandonedResponses += 1;
        reject(new TimeoutError(command, timeout, this.description));
      }, Math.max(0, remaining));

      this.pendingRead = {
        resolve: (line) => {
          clearTimeout(timer);
          this.pendingRead = undefined;
          resolve(line);
        },
        reject: (error) => {
          clearTimeout(timer);
          this.pendingRead = undefined;
          reject(error);
        },
      };
    });
  }

  private handleData(socket: net.Socket, chunk: Buffer): void {
    if (socket !== this.socket) return;
    this.reader.append(chunk);

    if (this.pendingRead === undefined) return;
    const line = this.takeLine();
    if (line !== undefined) {
      this.pendingRead.resolve(line);
    }
  }

  private handleSocketError(socket: net.Socket, error: Error): void {
    this.log.debug('[%s] socket error: %s', this.description, error.message);
    if (socket !== this.socket || this.pendingRead === undefined) return;
    this.pendingRead.reject(
      new TransportError(`read failed: ${error.message}`, this.description, {
        cause: error,
      }),
    );
  }

  private handleSocketClose(socket: net.Socket): void {
    if (socket !== this.socket) return;
    this.log.debug('[%s] socket closed by instrument', this.description);
    this.releaseSocket(socket);
  }

  private releaseSocket(socket: net.Socket): void {
    if (socket !== this.socket) return;
    this.socket = undefined;
    this.stateValue = 'disconnected';
    if (this.pendingRead !== undefined) {
      this.pendingRead.reject(
        new TransportError(
          'connection closed before a response arrived',
          this.description,
        ),
      );
    }
  }
}

/**
 * Creates a link for `options` and runs `body` with it connected; see
 * {@link InstrumentLink#use}.
 */
export async function withInstrumentLink<T>(
  options: InstrumentLinkOptions,
  body: (link: InstrumentLink) => Promise<T> | T,
): Promise<T> {
  return new InstrumentLink(options).use(body);
}
