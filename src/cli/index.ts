#!/usr/bin/env node
import dotenv from 'dotenv';
import { resolveRuntime } from '../config/runtime.js';
import { normalizeError } from '../utils/errors.js';
import { createCliLog } from './logger.js';
import { run } from './run.js';
import { createUi } from './ui.js';

dotenv.config({ override: false });

const runtime = resolveRuntime();
const ui = createUi(runtime.production ? { quiet: true } : {});
const log = createCliLog('cli', ui);

try {
  process.exitCode = run(process.argv.slice(2), { ui, log });
} catch (err) {
  const info = normalizeError(err);
  log.error(`${info.name}: ${info.message}`, { stack: info.stack });
  process.exitCode = 2;
}
