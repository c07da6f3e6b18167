import { inflateSync } from 'zlib';
import { DecodeError, errorMessage } from './errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Inflate one EDDN frame (zlib stream) into its JSON text. */
export function decodeFrame(frame: Buffer): string {
  if (frame.length === 0) throw new DecodeError('empty frame');
  let inflated: Buffer;
  try {
    inflated = inflateSync(frame);
  } catch (e) {
    throw new DecodeError(`inflate failed: ${errorMessage(e)}`, { cause: e });
  }
  try {
    return utf8.decode(inflated);
  } catch (e) {
    throw new DecodeError('payload is not valid UTF-8', { cause: e });
  }
}
