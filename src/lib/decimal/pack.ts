import { DecimalInvariantError } from './errors.js';

const CODE_ZERO = '0'.charCodeAt(0);

function nibble(digits: string, offset: number): number {
  const n = digits.charCodeAt(offset) - CODE_ZERO;
  if (!(n >= 0 && n <= 9)) {
    throw new DecimalInvariantError(`non-digit ${JSON.stringify(digits.charAt(offset))} reached the packer`);
  }
  return n;
}

/**
 * Drop sign and point characters, leaving the ordered digit string.
 */
export function digitString(text: string): string {
  return text.replace(/[+\-.]/g, '');
}

/**
 * Pack validated text two digits per byte.
 *
 * An odd digit count gets a leading '0'. Byte 0 holds the least-significant
 * pair; inside a byte the more significant digit is the high nibble.
 */
export function packDigits(text: string): Uint8Array {
  let digits = digitString(text);
  if (digits.length % 2 !== 0) digits = '0' + digits;

  const byteCount = digits.length / 2;
  const out = new Uint8Array(byteCount);

  for (let i = 0; i < byteCount; i++) {
    const low = 2 * (byteCount - i) - 1;
    out[i] = (nibble(digits, low - 1) << 4) | nibble(digits, low);
  }

  return out;
}
