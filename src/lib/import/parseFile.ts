import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable, SpreadsheetFormat } from "./types";

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const COMPOUND_FILE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

export type ParseFileResult = {
  format: SpreadsheetFormat;
  tables: RawTable[];
};

const fileExtension = (name: string): string =>
  name.includes(".") ? name.split(".").pop()?.toLowerCase() ?? "" : "";

const baseName = (name: string): string => {
  const fileName = name.split(/[\\/]/).pop() ?? name;
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
};

const startsWith = (bytes: Uint8Array, signature: number[]): boolean =>
  bytes.length >= signature.length && signature.every((byte, index) => bytes[index] === byte);

export const detectFormat = (
  bytes: Uint8Array,
  fileName?: string
): SpreadsheetFormat | null => {
  if (fileName && fileExtension(fileName) === "csv") {
    return "csv";
  }
  if (startsWith(bytes, ZIP_SIGNATURE)) {
    return "xlsx";
  }
  if (startsWith(bytes, COMPOUND_FILE_SIGNATURE)) {
    return "xls";
  }
  return null;
};

export const toBytes = (data: ArrayBuffer | Uint8Array): Uint8Array =>
  data instanceof Uint8Array ? data : new Uint8Array(data);

export const parseSpreadsheet = (
  bytes: Uint8Array,
  format: SpreadsheetFormat,
  fileName?: string
): ParseFileResult => {
  if (format === "csv") {
    const text = new TextDecoder("utf-8").decode(bytes);
    const sheetName = fileName ? baseName(fileName) : "Sheet1";
    return { format, tables: [parseCsvText(text, sheetName)] };
  }
  return { format, tables: parseXlsxBuffer(bytes) };
};
