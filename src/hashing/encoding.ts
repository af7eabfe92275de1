/**
 * Text <-> byte conversion under the supported encodings
 *
 * Buffer.from() silently substitutes characters it cannot represent, which
 * would make two different records hash alike. These helpers reject such
 * input instead.
 */

import { TextDecoder } from 'node:util';
import { BUFFER_ENCODINGS, type TextEncoding } from '../core/constants.js';
import { UndecodableRecordError } from '../core/errors.js';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const UNREPRESENTABLE: Readonly<Record<TextEncoding, RegExp>> = {
  utf_8: LONE_SURROGATE,
  utf_16_le: LONE_SURROGATE,
  latin_1: /[^\x00-\xff]/,
  ascii: /[^\x00-\x7f]/,
};

/**
 * Encode text to bytes
 *
 * @throws UndecodableRecordError if the text has no representation in `encoding`
 */
export function encodeText(text: string, encoding: TextEncoding): Buffer {
  if (UNREPRESENTABLE[encoding].test(text)) {
    throw new UndecodableRecordError(encoding);
  }
  return Buffer.from(text, BUFFER_ENCODINGS[encoding]);
}

/**
 * Decode bytes to text, failing on any byte sequence that is not valid
 * under `encoding`
 */
export function decodeBytes(bytes: Uint8Array, encoding: TextEncoding): string {
  switch (encoding) {
    case 'utf_8':
      return strictDecode(bytes, 'utf-8', encoding);
    case 'utf_16_le':
      return strictDecode(bytes, 'utf-16le', encoding);
    case 'latin_1':
      return Buffer.from(bytes).toString('latin1');
    case 'ascii':
      if (bytes.some((byte) => byte > 0x7f)) {
        throw new UndecodableRecordError(encoding);
      }
      return Buffer.from(bytes).toString('ascii');
  }
}

function strictDecode(bytes: Uint8Array, label: string, encoding: TextEncoding): string {
  const decoder = new TextDecoder(label, { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new UndecodableRecordError(encoding);
    }
    throw error;
  }
}
