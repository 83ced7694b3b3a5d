import type { RawCell } from "../lib/import/types";
import { findProgram, type ProgramDefinition } from "../lib/programs/registry";
import { normalizeTable } from "../lib/workbook/normalize";
import type { Sheet, Workbook } from "../lib/workbook/types";

export const buildSheet = (sheetName: string, headers: string[], rows: RawCell[][]): Sheet =>
  normalizeTable({ sheetName, headers, rows });

export const buildTestWorkbook = (...sheets: Sheet[]): Workbook => ({
  fingerprint: "test-fingerprint",
  sheetNames: sheets.map((sheet) => sheet.name),
  sheets: new Map(sheets.map((sheet) => [sheet.name, sheet]))
});

export const getProgram = (id: string): ProgramDefinition => {
  const program = findProgram(id);
  if (!program) {
    throw new Error(`Unknown program ${id}`);
  }
  return program;
};

export const encodeText = (text: string): Uint8Array => new TextEncoder().encode(text);
