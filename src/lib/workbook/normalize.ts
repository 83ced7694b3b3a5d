import type { RawCell, RawTable } from "../import/types";
import {
  isBooleanLiteral,
  isMissing,
  isTemporalColumnName,
  parseAmount,
  parseTemporalCell,
  stringifyCell,
  toBooleanFlag
} from "./coerce";
import type { Sheet, SheetColumn } from "./types";

export const toTextColumn = (name: string, cells: readonly RawCell[]): SheetColumn => ({
  name,
  kind: "text",
  values: cells.map(stringifyCell)
});

export const toTemporalColumn = (name: string, cells: readonly RawCell[]): SheetColumn => {
  try {
    return { name, kind: "temporal", values: cells.map(parseTemporalCell) };
  } catch {
    return toTextColumn(name, cells);
  }
};

/**
 * Promotes a column to numeric only when every non-empty cell parses as an
 * amount. A single stray value leaves the column as text.
 */
export const promoteNumericColumn = (
  name: string,
  cells: readonly RawCell[]
): SheetColumn | null => {
  const values: (number | null)[] = [];
  for (const cell of cells) {
    if (isMissing(cell)) {
      values.push(null);
      continue;
    }
    const parsed = parseAmount(cell);
    if (parsed === null) {
      return null;
    }
    values.push(parsed);
  }
  return { name, kind: "numeric", values };
};

export const normalizeColumn = (name: string, cells: readonly RawCell[]): SheetColumn => {
  if (isTemporalColumnName(name)) {
    return toTemporalColumn(name, cells);
  }

  const present = cells.filter((cell) => !isMissing(cell));
  if (present.length === 0) {
    return toTextColumn(name, cells);
  }

  if (present.every((cell) => typeof cell === "number")) {
    return {
      name,
      kind: "numeric",
      values: cells.map((cell) => (typeof cell === "number" && Number.isFinite(cell) ? cell : null))
    };
  }

  if (present.every(isBooleanLiteral)) {
    return {
      name,
      kind: "boolean",
      values: cells.map((cell) => toBooleanFlag(cell) ?? false)
    };
  }

  return promoteNumericColumn(name, cells) ?? toTextColumn(name, cells);
};

export const normalizeTable = (table: RawTable): Sheet => ({
  name: table.sheetName,
  rowCount: table.rows.length,
  columns: table.headers.map((header, index) =>
    normalizeColumn(
      header,
      table.rows.map((row) => row[index] ?? null)
    )
  )
});
