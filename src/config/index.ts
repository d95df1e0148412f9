import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ConstructOptions } from '../lib/decimal/index.js';

export type DecimalConfig = {
  zeroPrefix: 'collapse' | 'exact';
};

const decimalSchema = z.object({
  zeroPrefix: z.enum(['collapse', 'exact']),
}).strict();

// Other top-level sections are left alone
const fileSchema = z.object({
  decimal: decimalSchema.partial().optional(),
}).passthrough();

const DEFAULT_DECIMAL: DecimalConfig = { zeroPrefix: 'collapse' };

export const CONFIG_FILE = path.resolve(process.cwd(), 'config', 'config.json');
let cfg: DecimalConfig | null = null;

// For testing: reset the cache
export function resetDecimalConfigCache() {
  cfg = null;
}

function readSection(file: string): Partial<DecimalConfig> {
  if (!fs.existsSync(file)) return {};
  const parsed = fileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
  return parsed.decimal ?? {};
}

/**
 * Load the `decimal` section of config/config.json, apply env overrides and validate.
 * Missing file or section means defaults.
 */
export function loadDecimalConfig(file: string = CONFIG_FILE): DecimalConfig {
  const fromFile = readSection(file);
  const envOverrides: Record<string, string> = {};
  const envZero = process.env.PD_ZERO_PREFIX?.trim().toLowerCase();
  if (envZero) envOverrides.zeroPrefix = envZero;

  // zod rejects anything outside the enum, env included
  cfg = decimalSchema.parse({ ...DEFAULT_DECIMAL, ...fromFile, ...envOverrides });
  return cfg;
}

export function getDecimalConfig(): DecimalConfig {
  if (!cfg) return loadDecimalConfig();
  return cfg;
}

export function constructOptionsFromConfig(config: DecimalConfig = getDecimalConfig()): ConstructOptions {
  return { zeroPrefix: config.zeroPrefix };
}
