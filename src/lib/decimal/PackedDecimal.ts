/**
 * Packed (BCD) decimal record
 *
 * A decimal literal such as "-99084.566" is stored as three parts:
 * - numOfDecimals: how many digits followed the point (the scale)
 * - signature: Positive, Negative or the canonical Zero
 * - digits: two decimal digits per byte, least-significant pair first
 *
 * Records are immutable. The byte buffer is private and every accessor
 * returns a copy.
 */

import { decompose, type ZeroPrefixRule } from './decompose.js';
import { DecimalParseError } from './errors.js';
import { packDigits } from './pack.js';
import { Signature } from './signature.js';
import { describeViolation, findViolation } from './validate.js';

export interface ConstructOptions {
  /** How a leading '0' is treated (default: 'collapse') */
  zeroPrefix?: ZeroPrefixRule;
}

export interface PackedDecimalJSON {
  numOfDecimals: number;
  signature: Signature;
  digits: number[];
}

const ZERO_DIGITS: readonly number[] = [0x00];

export class PackedDecimal {
  readonly numOfDecimals: number;
  readonly signature: Signature;
  private readonly bytes: Uint8Array;

  private constructor(numOfDecimals: number, signature: Signature, bytes: Uint8Array) {
    this.numOfDecimals = numOfDecimals;
    this.signature = signature;
    this.bytes = bytes;
  }

  /**
   * Encode a decimal literal. Returns null for anything the grammar rejects.
   */
  static parse(input: string, opts: ConstructOptions = {}): PackedDecimal | null {
    if (findViolation(input) !== null) return null;
    return PackedDecimal.fromValidated(input, opts);
  }

  /**
   * Like parse, but malformed input raises a DecimalParseError naming the broken rule.
   */
  static parseStrict(input: string, opts: ConstructOptions = {}): PackedDecimal {
    const violation = findViolation(input);
    if (violation) {
      throw new DecimalParseError(
        `Invalid decimal ${JSON.stringify(input)}: ${describeViolation(violation)}`,
        violation.code,
        input,
        violation.index
      );
    }
    return PackedDecimal.fromValidated(input, opts);
  }

  private static fromValidated(text: string, opts: ConstructOptions): PackedDecimal {
    const parts = decompose(text, opts.zeroPrefix ?? 'collapse');
    if (parts.kind === 'zero') {
      return new PackedDecimal(0, Signature.Zero, Uint8Array.from(ZERO_DIGITS));
    }
    return new PackedDecimal(parts.numOfDecimals, parts.signature, packDigits(text));
  }

  /** Packed bytes, least-significant pair first (a fresh copy on every read) */
  get digits(): Uint8Array {
    return this.bytes.slice();
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  isZero(): boolean {
    return this.signature === Signature.Zero;
  }

  equals(other: PackedDecimal): boolean {
    if (this.numOfDecimals !== other.numOfDecimals) return false;
    if (this.signature !== other.signature) return false;
    if (this.bytes.length !== other.bytes.length) return false;
    return this.bytes.every((b, i) => b === other.bytes[i]);
  }

  /** Bytes as hex pairs in storage order, e.g. "8967452301" */
  toHex(): string {
    return Array.from(this.bytes, (b) => b.toString(16).padStart(2, '0')).join('');
  }

  toJSON(): PackedDecimalJSON {
    return {
      numOfDecimals: this.numOfDecimals,
      signature: this.signature,
      digits: Array.from(this.bytes),
    };
  }
}

export function construct(input: string, opts: ConstructOptions = {}): PackedDecimal | null {
  return PackedDecimal.parse(input, opts);
}

export function constructStrict(input: string, opts: ConstructOptions = {}): PackedDecimal {
  return PackedDecimal.parseStrict(input, opts);
}
