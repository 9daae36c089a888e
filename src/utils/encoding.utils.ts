import { TextDecoder } from 'util';
import { EncodingError } from './errors';

export const ENCODING_HINTS = ['auto', 'utf-8', 'utf-16le', 'utf-16be', 'latin1'] as const;
export type EncodingHint = (typeof ENCODING_HINTS)[number];
export type DetectedEncoding = Exclude<EncodingHint, 'auto'>;

export interface DecodedText {
  text: string;
  encoding: DetectedEncoding;
}

export function isEncodingHint(value: string): value is EncodingHint {
  return (ENCODING_HINTS as readonly string[]).includes(value);
}

function strictDecode(bytes: Buffer, label: 'utf-8' | 'utf-16le'): string | null {
  try {
    return new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return null;
  }
}

function decodeUtf16Be(bytes: Buffer): string | null {
  if (bytes.length % 2 !== 0) return null;
  const swapped = Buffer.from(bytes);
  swapped.swap16();
  return strictDecode(swapped, 'utf-16le');
}

function decodeLatin1(bytes: Buffer): string | null {
  for (const byte of bytes) {
    // C0 controls other than tab, LF and CR mean this is not text
    if (byte < 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d) return null;
    if (byte === 0x7f) return null;
  }
  return bytes.toString('latin1');
}

function decodeAs(bytes: Buffer, encoding: DetectedEncoding): string | null {
  switch (encoding) {
    case 'utf-8':
      return strictDecode(bytes, 'utf-8');
    case 'utf-16le':
      return bytes.length % 2 === 0 ? strictDecode(bytes, 'utf-16le') : null;
    case 'utf-16be':
      return decodeUtf16Be(bytes);
    case 'latin1':
      return decodeLatin1(bytes);
  }
}

/**
 * Guesses UTF-16 byte order from ASCII-heavy text: NULs cluster on even
 * offsets for big-endian and on odd offsets for little-endian.
 */
export function guessUtf16ByteOrder(bytes: Buffer): 'utf-16le' | 'utf-16be' | null {
  if (bytes.length < 2 || bytes.length % 2 !== 0) return null;
  let evenNuls = 0;
  let oddNuls = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] !== 0) continue;
    if (i % 2 === 0) evenNuls++;
    else oddNuls++;
  }
  const pairs = bytes.length / 2;
  if (oddNuls >= pairs * 0.5 && evenNuls === 0) return 'utf-16le';
  if (evenNuls >= pairs * 0.5 && oddNuls === 0) return 'utf-16be';
  return null;
}

function stripBom(bytes: Buffer): { body: Buffer; encoding: DetectedEncoding } | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { body: bytes.subarray(3), encoding: 'utf-8' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { body: bytes.subarray(2), encoding: 'utf-16le' };
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { body: bytes.subarray(2), encoding: 'utf-16be' };
  }
  return null;
}

/**
 * Decodes uploaded bytes. With `auto`: BOM, then the UTF-16 NUL pattern,
 * then strict UTF-8, then Latin-1. An explicit hint must decode strictly.
 */
export function decodeUpload(bytes: Buffer, hint: EncodingHint = 'auto'): DecodedText {
  const bom = stripBom(bytes);

  if (hint !== 'auto') {
    // A matching BOM is dropped; any other leading bytes are data
    const body = bom && bom.encoding === hint ? bom.body : bytes;
    const text = decodeAs(body, hint);
    if (text === null) {
      throw new EncodingError(`File could not be decoded as ${hint}`, { encoding: hint });
    }
    return { text, encoding: hint };
  }

  if (bom) {
    const text = decodeAs(bom.body, bom.encoding);
    if (text === null) {
      throw new EncodingError(`File has a ${bom.encoding} byte order mark but invalid content`, {
        encoding: bom.encoding,
      });
    }
    return { text, encoding: bom.encoding };
  }

  const utf8 = strictDecode(bytes, 'utf-8');
  // Valid UTF-8 can still be UTF-16 without a BOM; the NUL pattern decides
  const utf16 = guessUtf16ByteOrder(bytes);
  if (utf16) {
    const text = decodeAs(bytes, utf16);
    if (text !== null) return { text, encoding: utf16 };
  }
  if (utf8 !== null) return { text: utf8, encoding: 'utf-8' };

  const latin1 = decodeLatin1(bytes);
  if (latin1 !== null) return { text: latin1, encoding: 'latin1' };

  throw new EncodingError('Unable to determine file encoding', { encoding: 'auto' });
}
