import { formatConfig } from '../config/loader.js';
import type { ChecklessConfig } from '../config/schema.js';
import { createColorFns } from '../progress/colors.js';
import { formatConfigDisplay } from '../progress/formatters.js';

/**
 * Print the resolved configuration for --show-config
 */
export function printConfig(config: ChecklessConfig): void {
  console.log(formatConfigDisplay(config, createColorFns(config.output.color)));
  console.log('');
  console.log('Raw configuration:');
  console.log(formatConfig(config));
}
