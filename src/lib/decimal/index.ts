/**
 * Packed decimal encoding
 *
 * Turns signed decimal literals into a scale, a sign tag and BCD bytes.
 */

export {
  PackedDecimal,
  construct,
  constructStrict
} from './PackedDecimal.js';

export type { ConstructOptions, PackedDecimalJSON } from './PackedDecimal.js';

export { Signature, isSignature } from './signature.js';

export {
  isValidDecimal,
  findViolation,
  describeViolation,
  isAsciiDigit
} from './validate.js';

export type { DecimalViolation, ViolationCode } from './validate.js';

export { decompose } from './decompose.js';
export type { Decomposition, ZeroPrefixRule } from './decompose.js';

export { packDigits, digitString } from './pack.js';

export { DecimalParseError, DecimalInvariantError } from './errors.js';
