import { parseAmount } from "../workbook/coerce";
import { cellAt, cellKey, rowAt, selectRows } from "../workbook/rows";
import type { Sheet, SheetRow } from "../workbook/types";
import { metricValue, requireColumn, requireColumns, type MetricResult } from "./types";

export type NumericRange = {
  min: number;
  max: number;
};

export type DerivedMetric = {
  label: string;
  /** Columns the derivation reads; a missing one makes the metric unavailable. */
  requires: readonly string[];
  derive: (row: SheetRow) => number | null;
};

export type RankedRow = {
  rowIndex: number;
  value: number;
  row: SheetRow;
};

export const filterRange = (
  sheet: Sheet,
  column: string,
  range: NumericRange
): MetricResult<Sheet> => {
  const result = requireColumn(sheet, column);
  if (!result.ok) {
    return result;
  }
  const indices: number[] = [];
  for (let rowIndex = 0; rowIndex < sheet.rowCount; rowIndex += 1) {
    const value = parseAmount(cellAt(result.value, rowIndex));
    if (value !== null && value >= range.min && value <= range.max) {
      indices.push(rowIndex);
    }
  }
  return metricValue(selectRows(sheet, indices));
};

export const numericExtent = (sheet: Sheet, column: string): MetricResult<NumericRange | null> => {
  const result = requireColumn(sheet, column);
  if (!result.ok) {
    return result;
  }
  const values = result.value.values
    .map(parseAmount)
    .filter((value): value is number => value !== null);
  if (values.length === 0) {
    return metricValue(null);
  }
  return metricValue({
    min: values.reduce((min, value) => Math.min(min, value), values[0]),
    max: values.reduce((max, value) => Math.max(max, value), values[0])
  });
};

export const topN = (
  sheet: Sheet,
  options: { n: number; by: string | DerivedMetric }
): MetricResult<RankedRow[]> => {
  const { by } = options;
  const required = typeof by === "string" ? [by] : by.requires;
  const columns = requireColumns(sheet, required);
  if (!columns.ok) {
    return columns;
  }

  const ranked: RankedRow[] = [];
  for (let rowIndex = 0; rowIndex < sheet.rowCount; rowIndex += 1) {
    const row = rowAt(sheet, rowIndex);
    const value = typeof by === "string" ? parseAmount(row[by] ?? null) : by.derive(row);
    if (value !== null && Number.isFinite(value)) {
      ranked.push({ rowIndex, value, row });
    }
  }
  ranked.sort((a, b) => b.value - a.value);
  return metricValue(ranked.slice(0, Math.max(0, Math.floor(options.n))));
};

export const distinctCount = (sheet: Sheet, column: string): MetricResult<number> => {
  const result = requireColumn(sheet, column);
  if (!result.ok) {
    return result;
  }
  const keys = new Set<string>();
  result.value.values.forEach((value) => {
    const key = cellKey(value);
    if (key) {
      keys.add(key);
    }
  });
  return metricValue(keys.size);
};
