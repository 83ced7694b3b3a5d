import { cellKey } from "../workbook/rows";
import type { Workbook } from "../workbook/types";
import { totalFunding, type FundingTotal } from "./funding";

const SAMPLE_COLUMN_COUNT = 5;

export type SheetOverview = {
  name: string;
  records: number;
  columns: number;
  sampleColumns: string;
};

export type WorkbookSummary = {
  funding: FundingTotal;
  sheetCount: number;
  recordCount: number;
  statesCovered: number;
  sheets: SheetOverview[];
};

export const isStateColumnName = (name: string): boolean => name.toLowerCase().includes("state");

export const collectStates = (workbook: Workbook): Set<string> => {
  const states = new Set<string>();
  workbook.sheets.forEach((sheet) => {
    sheet.columns
      .filter((column) => isStateColumnName(column.name))
      .forEach((column) => {
        column.values.forEach((value) => {
          const key = cellKey(value);
          if (key) {
            states.add(key);
          }
        });
      });
  });
  return states;
};

export const summarizeWorkbook = (workbook: Workbook): WorkbookSummary => {
  const sheets = Array.from(workbook.sheets.values()).map<SheetOverview>((sheet) => {
    const names = sheet.columns.map((column) => column.name);
    const sample = names.slice(0, SAMPLE_COLUMN_COUNT).join(", ");
    return {
      name: sheet.name,
      records: sheet.rowCount,
      columns: names.length,
      sampleColumns: names.length > SAMPLE_COLUMN_COUNT ? `${sample}...` : sample
    };
  });

  return {
    funding: totalFunding(workbook),
    sheetCount: sheets.length,
    recordCount: sheets.reduce((sum, sheet) => sum + sheet.records, 0),
    statesCovered: collectStates(workbook).size,
    sheets
  };
};
