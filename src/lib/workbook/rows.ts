import type { CellValue, Sheet, SheetColumn, SheetRow } from "./types";

export const findColumn = (sheet: Sheet, name: string): SheetColumn | undefined =>
  sheet.columns.find((column) => column.name === name);

export const cellAt = (column: SheetColumn, rowIndex: number): CellValue =>
  column.values[rowIndex] ?? null;

export const rowAt = (sheet: Sheet, rowIndex: number): SheetRow => {
  const row: Record<string, CellValue> = {};
  sheet.columns.forEach((column) => {
    row[column.name] = cellAt(column, rowIndex);
  });
  return row;
};

export const sheetRows = (sheet: Sheet): SheetRow[] =>
  Array.from({ length: sheet.rowCount }, (_, rowIndex) => rowAt(sheet, rowIndex));

const pickValues = (column: SheetColumn, indices: readonly number[]): SheetColumn => {
  switch (column.kind) {
    case "numeric":
      return { ...column, values: indices.map((index) => column.values[index]) };
    case "boolean":
      return { ...column, values: indices.map((index) => column.values[index]) };
    case "temporal":
      return { ...column, values: indices.map((index) => column.values[index]) };
    case "text":
      return { ...column, values: indices.map((index) => column.values[index]) };
  }
};

export const selectRows = (sheet: Sheet, indices: readonly number[]): Sheet => ({
  name: sheet.name,
  rowCount: indices.length,
  columns: sheet.columns.map((column) => pickValues(column, indices))
});

export const takeRows = (sheet: Sheet, count: number): Sheet =>
  selectRows(
    sheet,
    Array.from({ length: Math.max(0, Math.min(count, sheet.rowCount)) }, (_, index) => index)
  );

export const numericColumnNames = (sheet: Sheet): string[] =>
  sheet.columns.filter((column) => column.kind === "numeric").map((column) => column.name);

/** String key of a cell for grouping and distinct counts; empty for missing cells. */
export const cellKey = (value: CellValue): string => {
  if (value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value.trim();
  }
  return String(value);
};
