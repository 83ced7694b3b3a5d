import { cellAt } from "../workbook/rows";
import type { CellValue, Sheet } from "../workbook/types";

const needsQuoting = /[",\r\n]/;

export const formatCsvValue = (value: CellValue): string => {
  if (value === null) {
    return "";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  return String(value);
};

export const escapeCsvField = (field: string): string =>
  needsQuoting.test(field) ? `"${field.replace(/"/g, '""')}"` : field;

export const toCsv = (sheet: Sheet): string => {
  const lines = [sheet.columns.map((column) => escapeCsvField(column.name)).join(",")];
  for (let rowIndex = 0; rowIndex < sheet.rowCount; rowIndex += 1) {
    lines.push(
      sheet.columns
        .map((column) => escapeCsvField(formatCsvValue(cellAt(column, rowIndex))))
        .join(",")
    );
  }
  return `${lines.join("\n")}\n`;
};

export const csvFileName = (sheetName: string, suffix = "filtered"): string => {
  const slug = sheetName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${slug || "sheet"}_${suffix}.csv`;
};
