import { constructOptionsFromConfig } from '../config/index.js';
import { resolveRuntime } from '../config/runtime.js';
import type { ConstructOptions } from '../lib/decimal/index.js';
import { formatCliError } from '../utils/errors.js';
import { encodeAll, toJsonLine, toRow } from './encode.js';
import { createCliLog, type CliLog } from './logger.js';
import { ui as defaultUi, type Ui } from './ui.js';

export type CliArgs = {
  json: boolean;
  exactZero: boolean;
  help: boolean;
  values: string[];
};

const USAGE = [
  'Usage: packed-decimal [--json] [--exact-zero] [--quiet] [--no-color] <value...>',
  '',
  'Encodes each value as scale, sign and packed BCD bytes (least-significant pair first).',
  '  --json        one JSON object per value',
  '  --exact-zero  only all-zero values collapse to the canonical zero',
  '  --            treat every following argument as a value',
];

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { json: false, exactZero: false, help: false, values: [] };
  let rest = false;
  for (const a of argv) {
    if (rest) { args.values.push(a); continue; }
    switch (a) {
      case '--': rest = true; break;
      case '--json': args.json = true; break;
      case '--exact-zero': args.exactZero = true; break;
      case '-h':
      case '--help': args.help = true; break;
      // consumed by the ui/theme layer
      case '--quiet':
      case '--no-color': break;
      // negative values look like flags; anything not listed above is a value
      default: args.values.push(a);
    }
  }
  return args;
}

export type RunDeps = {
  ui?: Ui;
  log?: CliLog;
  options?: () => ConstructOptions;
};

/**
 * Encode the values named in argv. Returns the process exit code:
 * 0 when every value encoded, 1 when any was malformed, 2 on usage or config errors.
 */
export function run(argv: string[], deps: RunDeps = {}): number {
  const ui = deps.ui ?? defaultUi;
  const log = deps.log ?? createCliLog('cli', ui);
  const runtime = resolveRuntime();
  const args = parseArgs(argv);

  if (args.help || args.values.length === 0) {
    for (const line of USAGE) ui.print(line);
    return args.help ? 0 : 2;
  }

  let options: ConstructOptions;
  try {
    options = (deps.options ?? constructOptionsFromConfig)();
  } catch (err) {
    log.error(formatCliError('config', err, runtime.verbose));
    return 2;
  }
  if (args.exactZero) options = { ...options, zeroPrefix: 'exact' };

  const startedAt = Date.now();
  const results = encodeAll(args.values, options);
  const failed = results.filter((r) => !r.ok);

  if (args.json) {
    for (const r of results) ui.print(toJsonLine(r));
  } else {
    ui.table(results.map(toRow));
  }

  for (const r of results) {
    if (!r.ok) ui.say(`${JSON.stringify(r.input)}: ${r.reason}`, 'warn');
  }
  log.debug('encoded', { count: results.length, failed: failed.length, zeroPrefix: options.zeroPrefix ?? 'collapse' });

  if (!args.json) {
    const summary = `${results.length - failed.length}/${results.length} encoded ${ui.elapsed(startedAt)}`;
    ui.say(summary, failed.length ? 'warn' : 'success');
  }
  return failed.length ? 1 : 0;
}
