export const Signature = {
  Positive: 'Positive',
  Negative: 'Negative',
  Zero: 'Zero',
} as const;

export type Signature = (typeof Signature)[keyof typeof Signature];

export function isSignature(value: unknown): value is Signature {
  return value === Signature.Positive || value === Signature.Negative || value === Signature.Zero;
}
