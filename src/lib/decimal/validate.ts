/**
 * Decimal literal grammar
 *
 * Accepted shape: an optional `+`/`-` or a digit, then digits with at most one
 * `.`, always ending on a digit. The second character must be a digit, so a
 * point can only appear from the third character on.
 *
 * Positions are counted in Unicode code points, not UTF-16 units.
 */

export type ViolationCode =
  | 'empty'
  | 'bad_lead'
  | 'bad_second'
  | 'bad_last'
  | 'bad_char'
  | 'multiple_points';

export interface DecimalViolation {
  code: ViolationCode;
  /** Code-point index of the offending character (absent for `empty`) */
  index?: number;
}

const POINT = '.';

export function isAsciiDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

function isLead(ch: string): boolean {
  return ch === '+' || ch === '-' || isAsciiDigit(ch);
}

/**
 * Report the first grammar rule the input breaks, or null when it is a valid literal.
 */
export function findViolation(text: string): DecimalViolation | null {
  const chars = Array.from(text);
  const count = chars.length;

  if (count === 0) return { code: 'empty' };
  if (!isLead(chars[0])) return { code: 'bad_lead', index: 0 };

  // A lone sign has no digit to end on
  if (!isAsciiDigit(chars[count - 1])) return { code: 'bad_last', index: count - 1 };

  let points = 0;
  for (let i = 1; i < count; i++) {
    const ch = chars[i];
    if (i === 1 && !isAsciiDigit(ch)) return { code: 'bad_second', index: 1 };
    if (ch === POINT) {
      points++;
      if (points > 1) return { code: 'multiple_points', index: i };
      continue;
    }
    if (!isAsciiDigit(ch)) return { code: 'bad_char', index: i };
  }

  return null;
}

export function isValidDecimal(text: string): boolean {
  return findViolation(text) === null;
}

export function describeViolation(v: DecimalViolation): string {
  const at = v.index === undefined ? '' : ` at position ${v.index}`;
  switch (v.code) {
    case 'empty': return 'input is empty';
    case 'bad_lead': return `must start with '+', '-' or a digit${at}`;
    case 'bad_second': return `expected a digit${at}`;
    case 'bad_last': return `must end with a digit${at}`;
    case 'bad_char': return `unexpected character${at}`;
    case 'multiple_points': return `more than one decimal point${at}`;
  }
}
