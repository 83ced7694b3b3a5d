import type { RawCell } from "./types";

const headerLabel = (value: RawCell | undefined): string => {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf()) ? "" : value.toISOString();
  }
  return String(value).trim();
};

export const buildHeaders = (rawHeaders: (RawCell | undefined)[]): string[] => {
  const seen = new Map<string, number>();
  return rawHeaders.map((header, index) => {
    const label = headerLabel(header) || `Column ${index + 1}`;
    const count = seen.get(label) ?? 0;
    seen.set(label, count + 1);
    return count === 0 ? label : `${label}.${count}`;
  });
};

export const padRow = (row: (RawCell | undefined)[], width: number): RawCell[] =>
  Array.from({ length: width }, (_, index) => row[index] ?? null);
