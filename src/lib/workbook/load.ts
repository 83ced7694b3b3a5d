import { detectFormat, parseSpreadsheet, toBytes } from "../import/parseFile";
import type { RawTable } from "../import/types";
import { fingerprintBytes } from "./fingerprint";
import { normalizeTable } from "./normalize";
import { LoadError, type LoadResult, type Sheet } from "./types";

export const buildWorkbook = (tables: readonly RawTable[], fingerprint: string): LoadResult => {
  if (tables.length === 0) {
    return {
      ok: false,
      error: new LoadError("NO_SHEETS", "The workbook does not contain any sheets.")
    };
  }
  const sheets = new Map<string, Sheet>();
  tables.forEach((table) => {
    sheets.set(table.sheetName, normalizeTable(table));
  });
  return {
    ok: true,
    workbook: {
      fingerprint,
      sheetNames: Array.from(sheets.keys()),
      sheets
    }
  };
};

export const loadWorkbook = (
  data: ArrayBuffer | Uint8Array,
  options: { fileName?: string } = {}
): LoadResult => {
  const bytes = toBytes(data);
  if (bytes.length === 0) {
    return { ok: false, error: new LoadError("EMPTY_FILE", "The file is empty.") };
  }

  const format = detectFormat(bytes, options.fileName);
  if (!format) {
    return {
      ok: false,
      error: new LoadError(
        "UNSUPPORTED_FORMAT",
        "Unsupported file type. Please upload an .xlsx, .xls or .csv file."
      )
    };
  }

  let tables: RawTable[];
  try {
    tables = parseSpreadsheet(bytes, format, options.fileName).tables;
  } catch (error) {
    return {
      ok: false,
      error: new LoadError(
        "UNREADABLE_FILE",
        "The file could not be read as a spreadsheet.",
        error instanceof Error ? error.message : String(error)
      )
    };
  }

  return buildWorkbook(tables, fingerprintBytes(bytes));
};
