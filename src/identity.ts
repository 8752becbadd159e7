import type InstrumentLink from './instrument-link';
import type { LinkSendOptions } from './instrument-link';

/**
 * Fields of an IEEE 488.2 `*IDN?` response.
 */
export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  serialNumber: string;
  firmwareVersion: string;
  /** Response exactly as received. */
  raw: string;
}

/**
 * Splits `<manufacturer>,<model>,<serial>,<firmware>`. Missing trailing
 * fields come back as empty strings; commas past the third belong to the
 * firmware field.
 */
export function parseIdentity(response: string): InstrumentIdentity {
  const [manufacturer = '', model = '', serialNumber = '', ...firmware] =
    response.split(',');

  return {
    manufacturer: manufacturer.trim(),
    model: model.trim(),
    serialNumber: serialNumber.trim(),
    firmwareVersion: firmware.join(',').trim(),
    raw: response,
  };
}

/**
 * Sends `*IDN?` and parses the answer.
 */
export async function queryIdentity(
  link: InstrumentLink,
  sendOptions?: LinkSendOptions,
): Promise<InstrumentIdentity> {
  return parseIdentity(await link.query('*IDN?', sendOptions));
}
