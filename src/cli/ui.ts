import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { colorEnabled, getPalette } from './theme.js';
import { isTestEnv } from '../config/runtime.js';

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

export type UiOptions = {
  out?: (line: string) => void;
  err?: (line: string) => void;
  noColor?: boolean;
  quiet?: boolean;
};

export type Ui = ReturnType<typeof createUi>;

function isQuiet() {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

export function createUi(opts: UiOptions = {}) {
  const out = opts.out ?? ((line: string) => console.log(line));
  const err = opts.err ?? ((line: string) => console.error(line));
  const noColor = opts.noColor ?? !colorEnabled();
  const quiet = opts.quiet ?? isQuiet();
  const palette = getPalette(noColor);
  const symbols = noColor
    ? { info: 'i', success: '√', warning: '‼', error: '×' }
    : logSymbols;

  function say(msg: string, style: Style = 'info') {
    if (quiet && style !== 'error' && style !== 'warn') return;
    switch (style) {
      case 'success': return out(`${symbols.success} ${palette.success(msg)}`);
      case 'warn': return err(`${symbols.warning} ${palette.warn(msg)}`);
      case 'error': return err(`${symbols.error} ${palette.error(msg)}`);
      case 'dim': return out(palette.dim(msg));
      case 'title': return out(palette.accent(msg));
      default: return out(`${symbols.info} ${palette.info(msg)}`);
    }
  }

  // Data goes to stdout even when quiet
  function print(line: string) {
    out(line);
  }

  function table(rows: Array<Record<string, string | number>>) {
    if (rows.length === 0) return out('(none)');
    const headers = Object.keys(rows[0]);
    const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
    out(headers.map((h, i) => palette.accent(h.padEnd(widths[i]))).join('  ').trimEnd());
    for (const r of rows) {
      out(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
    }
  }

  function elapsed(startedAt: number, now = Date.now()) {
    return palette.dim(`(${prettyMs(Math.max(0, now - startedAt))})`);
  }

  return { say, print, table, elapsed, palette };
}

// Console-bound instance; silent under Jest
export const ui = createUi(isTestEnv() ? { out: () => {}, err: () => {} } : {});
export default ui;
