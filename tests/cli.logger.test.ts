import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import { createCliLog } from '../src/cli/logger.js';
import { createUi } from '../src/cli/ui.js';
import { resolveRuntime } from '../src/config/runtime.js';

function capture() {
  const lines: string[] = [];
  const logger = pino({ level: 'debug', base: undefined }, { write: (s: string) => { lines.push(s); } });
  const err: string[] = [];
  const ui = createUi({ out: () => {}, err: (l) => err.push(l), noColor: true, quiet: false });
  return { lines, err, log: createCliLog('cli', ui, logger) };
}

describe('createCliLog', () => {
  it('writes scoped records to pino', () => {
    const c = capture();
    c.log.debug('encoded', { count: 2 });
    expect(c.lines).toHaveLength(1);
    const rec = JSON.parse(c.lines[0]);
    expect(rec.level).toBe(20);
    expect(rec.scope).toBe('cli');
    expect(rec.msg).toBe('encoded');
    expect(rec.data).toEqual({ count: 2 });
    expect(c.err).toEqual([]);
  });

  it('echoes warnings to the terminal', () => {
    const c = capture();
    c.log.warn('careful');
    expect(JSON.parse(c.lines[0]).level).toBe(40);
    expect(c.err).toHaveLength(1);
    expect(c.err[0]).toMatch(/^‼ \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} careful$/);
  });
});

describe('resolveRuntime', () => {
  it('is silent under test', () => {
    expect(resolveRuntime({ JEST_WORKER_ID: '1' })).toEqual({
      production: false, verbose: false, logLevel: 'silent', pretty: false,
    });
  });

  it('verbose only outside production', () => {
    expect(resolveRuntime({ PD_VERBOSE: 'true' }).logLevel).toBe('debug');
    expect(resolveRuntime({ PD_VERBOSE: 'true', PD_PRODUCTION: 'true' })).toEqual({
      production: true, verbose: false, logLevel: 'info', pretty: false,
    });
  });
});
