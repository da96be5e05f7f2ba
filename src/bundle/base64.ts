import { MalformedEncodingError } from '../errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Strict base64 decoding. Buffer.from silently skips invalid characters, so
 * the text is checked first.
 */
export function fromBase64(text: string, what: string): Uint8Array {
  if (text.length % 4 !== 0 || !BASE64_PATTERN.test(text)) {
    throw new MalformedEncodingError(`${what} is not valid base64`);
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}
