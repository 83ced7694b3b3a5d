export type RawCell = string | number | boolean | Date | null;

export type RawTable = {
  sheetName: string;
  headers: string[];
  rows: RawCell[][];
};

export type SpreadsheetFormat = "xlsx" | "xls" | "csv";
