import { csvFileName, toCsv } from "./csv";
import type { Sheet } from "../workbook/types";

export const downloadCsv = (sheet: Sheet): string => {
  const fileName = csvFileName(sheet.name);
  const blob = new Blob([toCsv(sheet)], { type: "text/csv;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = fileName;
  anchor.click();
  window.setTimeout(() => URL.revokeObjectURL(url), 0);
  return fileName;
};
