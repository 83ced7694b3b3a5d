import * as XLSX from "xlsx";
import { buildHeaders, padRow } from "./headers";
import type { RawCell, RawTable } from "./types";

const normalizeCell = (value: unknown): RawCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf()) ? null : value;
  }
  return String(value);
};

export const parseXlsxBuffer = (data: Uint8Array): RawTable[] => {
  const workbook = XLSX.read(data, { type: "array", cellDates: true });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) {
      return { sheetName, headers: [], rows: [] };
    }
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: true,
      defval: null,
      blankrows: false
    });

    const headers = buildHeaders((rows[0] ?? []).map(normalizeCell));
    const dataRows = rows
      .slice(1)
      .map((row) => padRow(row.map(normalizeCell), headers.length));

    return {
      sheetName,
      headers,
      rows: dataRows
    };
  });
};
