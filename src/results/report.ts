/**
 * Plain-text rendering of matched series for terminal output
 */

import type { StatSeries } from '../types/index.js';

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

/**
 * Markdown table with one row per table type and one column per statistic.
 * All series are expected to come from the same match, so their xs agree.
 */
export function formatSeriesTable(seriesByStat: Record<string, StatSeries>): string {
  const stats = Object.keys(seriesByStat);
  if (stats.length === 0) return '';

  const first = seriesByStat[stats[0]];
  const header = [first.x_axis, ...stats.map((stat) => seriesByStat[stat].y_axis || stat)];
  const lines = [`| ${header.join(' | ')} |`, `|${header.map(() => '---').join('|')}|`];

  first.xs.forEach((table, i) => {
    const cells = stats.map((stat) => formatNumber(seriesByStat[stat].ys[i]));
    lines.push(`| ${table} | ${cells.join(' | ')} |`);
  });

  return lines.join('\n');
}
