import type { Sheet, SheetColumn, Workbook } from "../workbook/types";
import { findColumn } from "../workbook/rows";

export type MetricIssue =
  | { code: "MISSING_SHEET"; sheet: string; message: string }
  | { code: "MISSING_COLUMN"; sheet: string; column: string; message: string };

export type MetricResult<T> = { ok: true; value: T } | { ok: false; issue: MetricIssue };

export const metricValue = <T>(value: T): MetricResult<T> => ({ ok: true, value });

export const missingSheet = (sheet: string): MetricIssue => ({
  code: "MISSING_SHEET",
  sheet,
  message: `Sheet "${sheet}" was not found in the workbook.`
});

export const missingColumn = (sheet: string, column: string): MetricIssue => ({
  code: "MISSING_COLUMN",
  sheet,
  column,
  message: `Column "${column}" was not found in sheet "${sheet}".`
});

export const requireSheet = (workbook: Workbook, name: string): MetricResult<Sheet> => {
  const sheet = workbook.sheets.get(name);
  return sheet ? metricValue(sheet) : { ok: false, issue: missingSheet(name) };
};

export const requireColumn = (sheet: Sheet, name: string): MetricResult<SheetColumn> => {
  const column = findColumn(sheet, name);
  return column ? metricValue(column) : { ok: false, issue: missingColumn(sheet.name, name) };
};

export const requireColumns = (
  sheet: Sheet,
  names: readonly string[]
): MetricResult<SheetColumn[]> => {
  const columns: SheetColumn[] = [];
  for (const name of names) {
    const result = requireColumn(sheet, name);
    if (!result.ok) {
      return result;
    }
    columns.push(result.value);
  }
  return metricValue(columns);
};
