import { cellKey } from "../workbook/rows";
import type { ColumnKind, Sheet, SheetColumn } from "../workbook/types";

const MAX_EXAMPLES = 5;
const MAX_EXAMPLE_LENGTH = 120;

export type NumericStats = {
  count: number;
  mean: number;
  /** Sample standard deviation; null with fewer than two values. */
  std: number | null;
  min: number;
  q25: number;
  median: number;
  q75: number;
  max: number;
};

export type ColumnProfile = {
  name: string;
  kind: ColumnKind;
  missingCount: number;
  nonEmptyRatio: number;
  examples: string[];
  stats: NumericStats | null;
};

export type SheetProfile = {
  name: string;
  rowCount: number;
  columnCount: number;
  columns: ColumnProfile[];
};

const quantile = (sorted: number[], q: number): number => {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

export const describeNumbers = (values: number[]): NumericStats | null => {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((sum, value) => sum + value, 0) / count;
  const variance =
    count > 1 ? sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1) : null;
  return {
    count,
    mean,
    std: variance === null ? null : Math.sqrt(variance),
    min: sorted[0],
    q25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q75: quantile(sorted, 0.75),
    max: sorted[count - 1]
  };
};

const profileColumn = (column: SheetColumn, rowCount: number): ColumnProfile => {
  const keys = column.values.map(cellKey);
  const present = keys.filter((key) => key.length > 0);
  const numbers =
    column.kind === "numeric"
      ? column.values.filter((value): value is number => value !== null)
      : [];
  return {
    name: column.name,
    kind: column.kind,
    missingCount: rowCount - present.length,
    nonEmptyRatio: rowCount === 0 ? 0 : present.length / rowCount,
    examples: present.slice(0, MAX_EXAMPLES).map((key) => key.slice(0, MAX_EXAMPLE_LENGTH)),
    stats: column.kind === "numeric" ? describeNumbers(numbers) : null
  };
};

export const profileSheet = (sheet: Sheet): SheetProfile => ({
  name: sheet.name,
  rowCount: sheet.rowCount,
  columnCount: sheet.columns.length,
  columns: sheet.columns.map((column) => profileColumn(column, sheet.rowCount))
});
