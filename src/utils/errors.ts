// src/utils/errors.ts
import { DecimalParseError } from '../lib/decimal/index.js';

export function shortStack(err: unknown, lines = 3): string {
  if (!(err instanceof Error) || !err.stack) return '';
  return err.stack.split('\n').slice(0, lines + 1).join('\n');
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

/**
 * Malformed input is a user error; anything else is reported with a stack.
 */
export function formatCliError(context: string, err: unknown, verbose: boolean): string {
  if (err instanceof DecimalParseError) return err.message;
  const info = normalizeError(err);
  const base = `${context}: ${info.name}: ${info.message}`;
  const stack = shortStack(err, verbose ? 6 : 0);
  return verbose && stack ? `${base}\n${stack}` : base;
}
