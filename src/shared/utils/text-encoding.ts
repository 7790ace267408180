/**
 * Text Encoding
 *
 * Subtitle files are decoded with TextDecoder, so any WHATWG encoding label
 * is accepted (utf-8, utf-16le, windows-1252, shift_jis, gb18030, ...).
 */

import { TextDecoder } from 'util';
import { ErrorCodes, MalformedInputError, createValidationError } from './error-handler';

export const DEFAULT_ENCODING = 'utf-8';

export function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Decode `bytes` strictly: bytes that are invalid in `encoding` raise a
 * MalformedInputError instead of turning into replacement characters.
 * A leading byte order mark is dropped.
 */
export function decodeText(bytes: Uint8Array, encoding: string = DEFAULT_ENCODING): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    if (error instanceof RangeError) {
      throw createValidationError(`Unsupported text encoding: ${encoding}`, { encoding });
    }
    throw error;
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new MalformedInputError(`Input is not valid ${decoder.encoding} text`, {
        code: ErrorCodes.PARSE_INVALID_ENCODING,
        context: { encoding: decoder.encoding },
        cause: error,
      });
    }
    throw error;
  }
}
