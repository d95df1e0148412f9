import { Signature } from './signature.js';

export type ZeroPrefixRule = 'collapse' | 'exact';

export type Decomposition =
  | { kind: 'zero' }
  | { kind: 'value'; signature: Signature; numOfDecimals: number };

function countDecimals(text: string): number {
  const point = text.indexOf('.');
  if (point < 0) return 0;
  return Array.from(text.slice(point + 1)).length;
}

function allZeroDigits(text: string): boolean {
  return /^[+-]?[0.]+$/.test(text);
}

/**
 * Split validated text into sign and scale.
 *
 * Under `collapse`, anything with a leading '0' is the canonical zero, even "00.5".
 * Under `exact`, only an all-zero value is, whatever its sign prefix.
 */
export function decompose(text: string, zeroPrefix: ZeroPrefixRule = 'collapse'): Decomposition {
  const lead = text.charAt(0);

  if (zeroPrefix === 'collapse' ? lead === '0' : allZeroDigits(text)) {
    return { kind: 'zero' };
  }

  return {
    kind: 'value',
    signature: lead === '-' ? Signature.Negative : Signature.Positive,
    numOfDecimals: countDecimals(text),
  };
}
