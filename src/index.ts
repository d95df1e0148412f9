import { constructOptionsFromConfig } from './config/index.js';
import { PackedDecimal } from './lib/decimal/index.js';

export * from './lib/decimal/index.js';
export {
  loadDecimalConfig,
  getDecimalConfig,
  resetDecimalConfigCache,
  constructOptionsFromConfig
} from './config/index.js';
export type { DecimalConfig } from './config/index.js';

/**
 * Encode with the options from config/config.json and the environment.
 */
export function constructWithConfig(input: string): PackedDecimal | null {
  return PackedDecimal.parse(input, constructOptionsFromConfig());
}
