import type { RawCell } from "../import/types";
import type { CellValue } from "./types";

const numericPattern = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const accountingPattern = /^\((.*)\)$/;
const temporalNamePattern = /date|time/i;
const booleanLiteralPattern = /^(?:true|false)$/i;
const MONTH_NAME = "(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?";
const dateTextPatterns = [
  // 2024-01-15, 2024-01-15T10:30:00Z, 2024-01-15 10:30
  /^\d{4}-\d{1,2}-\d{1,2}(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i,
  // 1/15/2024, 1/15/2024 10:30 AM
  /^\d{1,2}\/\d{1,2}\/\d{4}(?:\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?)?$/i,
  // Jan 15, 2024
  new RegExp(`^${MONTH_NAME}\\s+\\d{1,2},?\\s+\\d{4}$`, "i"),
  // 15 January 2024
  new RegExp(`^\\d{1,2}\\s+${MONTH_NAME},?\\s+\\d{4}$`, "i")
];

// Serial day 25569 is 1970-01-01 in the 1900 date system.
const SERIAL_UNIX_EPOCH = 25569;
const MS_PER_DAY = 86_400_000;

const BOOLEAN_TOKENS: Record<string, boolean> = {
  true: true,
  false: false,
  "1": true,
  "0": false,
  yes: true,
  no: false
};

export const isMissing = (value: RawCell | CellValue | undefined): boolean => {
  if (value === null || value === undefined) {
    return true;
  }
  return typeof value === "string" && value.trim() === "";
};

/** Columns whose name mentions a date or time are parsed as timestamps first. */
export const isTemporalColumnName = (name: string): boolean => temporalNamePattern.test(name);

export const isBooleanLiteral = (value: RawCell): boolean =>
  typeof value === "boolean" || (typeof value === "string" && booleanLiteralPattern.test(value.trim()));

export const cleanNumericText = (value: string): string => {
  const stripped = value.replace(/[$,]/g, "").trim();
  const accounting = accountingPattern.exec(stripped);
  return accounting ? `-${accounting[1].trim()}` : stripped;
};

/**
 * Reads an amount that may carry currency formatting: `$1,250.50`, `(300)` for -300.
 * Returns null for anything that is not a finite number once cleaned.
 */
export const parseAmount = (value: RawCell | CellValue): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = cleanNumericText(value);
  if (!numericPattern.test(cleaned)) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const toBooleanFlag = (value: RawCell | CellValue): boolean | null => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (value === 1) {
      return true;
    }
    return value === 0 ? false : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  return BOOLEAN_TOKENS[value.trim().toLowerCase()] ?? null;
};

export const serialToTimestamp = (serial: number): number => {
  // Serials below 61 predate the phantom 1900-02-29 and sit one day later.
  const adjusted = serial < 61 ? serial + 1 : serial;
  return Math.round((adjusted - SERIAL_UNIX_EPOCH) * MS_PER_DAY);
};

export const isDateText = (value: string): boolean =>
  dateTextPatterns.some((pattern) => pattern.test(value));

/**
 * Parses one cell of a temporal column: dates as-is, numbers as serial days,
 * text only in a recognizable date form. Anything else, including instants
 * a Date cannot hold, gives null.
 */
export const parseTemporalCell = (value: RawCell): string | null => {
  if (isMissing(value) || typeof value === "boolean" || value === null) {
    return null;
  }
  let timestamp: number;
  if (value instanceof Date) {
    timestamp = value.valueOf();
  } else if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) {
      return null;
    }
    timestamp = serialToTimestamp(value);
  } else {
    const text = value.trim();
    if (!isDateText(text)) {
      return null;
    }
    timestamp = Date.parse(text);
  }
  const date = new Date(timestamp);
  return Number.isNaN(date.valueOf()) ? null : date.toISOString();
};

export const stringifyCell = (value: RawCell): string => {
  if (value === null) {
    return "";
  }
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf()) ? "" : value.toISOString();
  }
  if (typeof value === "string") {
    return isMissing(value) ? "" : value;
  }
  return String(value);
};
