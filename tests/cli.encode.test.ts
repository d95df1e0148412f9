import { describe, it, expect } from '@jest/globals';
import { parseArgs, run } from '../src/cli/run.js';
import { createUi } from '../src/cli/ui.js';
import type { CliLog } from '../src/cli/logger.js';
import type { ConstructOptions } from '../src/lib/decimal/index.js';

function harness(options: () => ConstructOptions = () => ({})) {
  const out: string[] = [];
  const err: string[] = [];
  const errors: string[] = [];
  const ui = createUi({ out: (l) => out.push(l), err: (l) => err.push(l), noColor: true, quiet: false });
  const log: CliLog = {
    info: () => {},
    warn: () => {},
    debug: () => {},
    error: (msg) => { errors.push(msg); },
  };
  return { out, err, errors, deps: { ui, log, options } };
}

describe('parseArgs', () => {
  it('separates flags from values', () => {
    expect(parseArgs(['--json', '-5', '12.5', '--no-color'])).toEqual({
      json: true, exactZero: false, help: false, values: ['-5', '12.5'],
    });
  });

  it('everything after -- is a value', () => {
    expect(parseArgs(['--', '--json']).values).toEqual(['--json']);
  });
});

describe('run', () => {
  it('prints a table of encoded values', () => {
    const h = harness();
    expect(run(['+1234.56789', '-5'], h.deps)).toBe(0);
    expect(h.out.slice(0, 3)).toEqual([
      'input        signature  decimals  bytes  hex',
      '+1234.56789  Positive   5         5      8967452301',
      '-5           Negative   0         1      05',
    ]);
    expect(h.out[3]).toMatch(/^√ 2\/2 encoded \(\d+ms\)$/);
    expect(h.err).toEqual([]);
  });

  it('flags malformed values and exits with 1', () => {
    const h = harness();
    expect(run(['12a4'], h.deps)).toBe(1);
    expect(h.out).toEqual([
      'input  signature  decimals  bytes  hex',
      '12a4   -          -         -      invalid',
    ]);
    expect(h.err[0]).toBe('‼ "12a4": unexpected character at position 2');
    expect(h.err[1]).toMatch(/^‼ 0\/1 encoded \(\d+ms\)$/);
  });

  it('emits one JSON line per value', () => {
    const h = harness();
    expect(run(['--json', '-5', 'x'], h.deps)).toBe(1);
    expect(h.out).toEqual([
      '{"input":"-5","value":{"numOfDecimals":0,"signature":"Negative","digits":[5]}}',
      '{"input":"x","value":null}',
    ]);
    expect(h.err).toEqual(['‼ "x": must start with \'+\', \'-\' or a digit at position 0']);
  });

  it('--exact-zero packs zero-leading values', () => {
    const h = harness();
    expect(run(['--json', '--exact-zero', '00.5'], h.deps)).toBe(0);
    expect(h.out).toEqual(['{"input":"00.5","value":{"numOfDecimals":1,"signature":"Positive","digits":[5,0]}}']);
  });

  it('prints usage without values', () => {
    const h = harness();
    expect(run([], h.deps)).toBe(2);
    expect(h.out[0]).toBe('Usage: packed-decimal [--json] [--exact-zero] [--quiet] [--no-color] <value...>');
    expect(run(['--help'], harness().deps)).toBe(0);
  });

  it('reports config errors', () => {
    const h = harness(() => { throw new Error('bad config'); });
    expect(run(['1'], h.deps)).toBe(2);
    expect(h.errors).toEqual(['config: Error: bad config']);
  });
});
