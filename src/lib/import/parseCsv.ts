import { buildHeaders, padRow } from "./headers";
import type { RawCell, RawTable } from "./types";

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (text: string): string => {
  const headerLine = text.split("\n", 1)[0] ?? "";
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

const parseDelimitedRecords = (text: string, delimiter: string): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      if (inQuotes && text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      record.push(current);
      current = "";
      continue;
    }

    if (char === "\n" && !inQuotes) {
      record.push(current);
      records.push(record);
      record = [];
      current = "";
      continue;
    }

    current += char;
  }

  if (current.length > 0 || record.length > 0) {
    record.push(current);
    records.push(record);
  }

  return records.filter((fields) => fields.some((field) => field.trim().length > 0));
};

// Cells stay as written; typing happens per column in the normalizer.
const coerceCell = (value: string): RawCell => (value.trim() ? value : null);

export const parseCsvText = (text: string, sheetName = "Sheet1"): RawTable => {
  const sanitized = sanitizeText(text);
  const records = parseDelimitedRecords(sanitized, detectDelimiter(sanitized));
  if (records.length === 0) {
    throw new Error("CSV appears to be empty.");
  }

  const headers = buildHeaders(records[0]);
  const rows = records.slice(1).map((record) => padRow(record.map(coerceCell), headers.length));

  return {
    sheetName,
    headers,
    rows
  };
};
