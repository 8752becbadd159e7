import type { InstrumentLinkOptions } from '../endpoint';
import InstrumentLink from '../instrument-link';

/**
 * Connection defaults for the Anritsu MT9085 ACCESS Master SCPI socket.
 *
 * The instrument terminates lines with CR LF and needs a short pause after
 * each command before it accepts the next one.
 */
export const MT9085_DEFAULTS = {
  port: 2288,
  timeout: 10000,
  terminator: '\r\n',
  commandDelay: 100,
} as const satisfies Omit<InstrumentLinkOptions, 'host'>;

export type Mt9085LinkOptions = Partial<Omit<InstrumentLinkOptions, 'host'>>;

/**
 * Link to an MT9085 at `host`. `overrides` replace individual defaults.
 */
export function createMt9085Link(
  host: string,
  overrides: Mt9085LinkOptions = {},
): InstrumentLink {
  return new InstrumentLink({ ...MT9085_DEFAULTS, ...overrides, host });
}
