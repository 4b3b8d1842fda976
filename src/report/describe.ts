import type { ResultSet } from '../executor/query-executor.js';

export interface ColumnStatistics {
  count: number;
  mean: number;
  /** Sample standard deviation; null with fewer than two values. */
  std: number | null;
  min: number;
  '25%': number;
  '50%': number;
  '75%': number;
  max: number;
}

export type SummaryStatistics = Record<string, ColumnStatistics>;

/** Linear interpolation between closest ranks, on sorted input. */
export function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

function numericValues(result: Pick<ResultSet, 'rows'>, index: number): number[] | null {
  const values: number[] = [];
  for (const row of result.rows) {
    const value = row[index];
    if (value === null || value === undefined) continue;
    if (typeof value !== 'number') return null;
    values.push(value);
  }
  return values.length > 0 ? values : null;
}

function summarize(values: number[]): ColumnStatistics {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((sum, v) => sum + v, 0) / count;
  const std =
    count > 1 ? Math.sqrt(sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1)) : null;

  return {
    count,
    mean,
    std,
    min: sorted[0],
    '25%': quantile(sorted, 0.25),
    '50%': quantile(sorted, 0.5),
    '75%': quantile(sorted, 0.75),
    max: sorted[count - 1],
  };
}

/**
 * Summary statistics for every numeric column of a result. A column counts as
 * numeric when all of its non-null values are numbers. Returns null when there
 * are no rows or no numeric column.
 */
export function describe(result: Pick<ResultSet, 'columns' | 'rows'>): SummaryStatistics | null {
  if (result.rows.length === 0) return null;

  const statistics: SummaryStatistics = {};
  result.columns.forEach((column, index) => {
    const values = numericValues(result, index);
    if (values) statistics[column] = summarize(values);
  });

  return Object.keys(statistics).length > 0 ? statistics : null;
}
