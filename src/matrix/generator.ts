/**
 * Matrix Generator
 *
 * Cartesian product keys × values × tables as a lazy, restartable sequence.
 */

import type { AxisCatalog } from '../types/index.js';
import { BuildConfiguration } from './build-configuration.js';

export interface ConfigurationMatrix extends Iterable<BuildConfiguration> {
  /** |keys| · |values| · |tables| */
  readonly size: number;
}

/**
 * Every (key, value, table) combination exactly once, in stored axis order,
 * with the table axis varying fastest. Each iteration starts over.
 */
export function generateMatrix(
  catalog: Pick<AxisCatalog, 'keys' | 'values' | 'tables'>
): ConfigurationMatrix {
  const { keys, values, tables } = catalog;

  return {
    size: keys.length * values.length * tables.length,
    *[Symbol.iterator]() {
      for (const key of keys) {
        for (const value of values) {
          for (const table of tables) {
            yield new BuildConfiguration(key, value, table);
          }
        }
      }
    },
  };
}
