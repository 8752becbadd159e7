export {
  default as InstrumentLink,
  withInstrumentLink,
  type LinkSendOptions,
  type LinkState,
} from './instrument-link';

export {
  DEFAULT_TERMINATOR,
  DEFAULT_TIMEOUT,
  describeEndpoint,
  normalizeEndpoint,
  type Endpoint,
  type EndpointOptions,
  type InstrumentLinkOptions,
} from './endpoint';

export {
  AlreadyConnectedError,
  ConnectionError,
  NotConnectedError,
  ScpiLinkError,
  TimeoutError,
  TransportError,
} from './errors';

export {
  parseIdentity,
  queryIdentity,
  type InstrumentIdentity,
} from './identity';

export {
  MT9085_DEFAULTS,
  createMt9085Link,
  type Mt9085LinkOptions,
} from './instruments/mt9085';

export { default as LineReader } from './network/line-reader';

export {
  LOGGER_NAME,
  default as createLogger,
  type LogLevelMethodNames,
  type Logger,
} from './logger';
