/**
 * Output helpers for finished runs: the classic `In <label>: <value>` listing plus
 * CSV / JSON Lines exports of a tally.
 */
import { POSITION_LABELS } from '../grid/grid.constants';
import {
  coordinateOf,
  type OccupancyPercentages,
  type OccupancyTally,
} from './simulator.tally';

/**
 * One line per position in label order.
 *
 * @example
 * formatPercentages(pct);
 * // In zero: 0.1428...
 * // In one: 0.2142...
 * // ...
 */
export function formatPercentages(percentages: OccupancyPercentages): string {
  return POSITION_LABELS.map(
    (label) => `In ${label}: ${percentages[label]}`
  ).join('\n');
}

/** Row shape shared by the CSV and JSONL exports. */
export interface TallyRow {
  label: string;
  x: number;
  y: number;
  count: number;
  /** Omitted when the tally has zero iterations. */
  percentage?: number;
}

/** Flatten a tally into one row per position. */
export function tallyRows(tally: OccupancyTally): TallyRow[] {
  return POSITION_LABELS.map((label) => {
    const [x, y] = coordinateOf(label);
    const count = tally.countOf(label);
    const row: TallyRow = { label, x, y, count };
    if (tally.iterations > 0) row.percentage = count / tally.iterations;
    return row;
  });
}

/**
 * CSV with header `label,x,y,count,percentage`; the percentage column is left empty
 * for a zero-iteration tally.
 */
export function exportTallyCSV(tally: OccupancyTally): string {
  const lines = ['label,x,y,count,percentage'];
  for (const row of tallyRows(tally)) {
    lines.push(
      [row.label, row.x, row.y, row.count, row.percentage ?? ''].join(',')
    );
  }
  return lines.join('\n');
}

/** JSON Lines: one object per position; each line parses on its own. */
export function exportTallyJSONL(tally: OccupancyTally): string {
  return tallyRows(tally)
    .map((row) => JSON.stringify(row))
    .join('\n');
}
