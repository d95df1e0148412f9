import {
  PackedDecimal,
  findViolation,
  describeViolation,
  type ConstructOptions,
  type PackedDecimalJSON,
} from '../lib/decimal/index.js';

export type EncodeResult =
  | { input: string; ok: true; value: PackedDecimal }
  | { input: string; ok: false; reason: string };

export function encodeOne(input: string, opts: ConstructOptions = {}): EncodeResult {
  const value = PackedDecimal.parse(input, opts);
  if (value) return { input, ok: true, value };
  const violation = findViolation(input);
  return { input, ok: false, reason: violation ? describeViolation(violation) : 'invalid' };
}

export function encodeAll(inputs: string[], opts: ConstructOptions = {}): EncodeResult[] {
  return inputs.map((input) => encodeOne(input, opts));
}

export function toRow(result: EncodeResult): Record<string, string | number> {
  if (!result.ok) {
    return { input: result.input, signature: '-', decimals: '-', bytes: '-', hex: 'invalid' };
  }
  const v = result.value;
  return {
    input: result.input,
    signature: v.signature,
    decimals: v.numOfDecimals,
    bytes: v.byteLength,
    hex: v.toHex(),
  };
}

export function toJsonLine(result: EncodeResult): string {
  const body: { input: string; value: PackedDecimalJSON | null } = {
    input: result.input,
    value: result.ok ? result.value.toJSON() : null,
  };
  return JSON.stringify(body);
}
