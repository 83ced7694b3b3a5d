import { parseAmount } from "../workbook/coerce";
import type { Sheet, SheetColumn, Workbook } from "../workbook/types";
import {
  metricValue,
  requireColumn,
  requireSheet,
  type MetricIssue,
  type MetricResult
} from "./types";

export type FundingSource = {
  sheet: string;
  column: string;
};

export type FundingTerm = FundingSource & {
  amount: number;
  issue: MetricIssue | null;
};

export type FundingTotal = {
  total: number;
  terms: FundingTerm[];
};

export const FUNDING_SOURCES: readonly FundingSource[] = [
  { sheet: "Emergency Connectivity Fund", column: "FRN Approved Amount" },
  { sheet: "E-Rate", column: "Category1_Funding" },
  { sheet: "E-Rate", column: "Category2_Funding" },
  { sheet: "Public Housing Funding", column: "Award_Amount_USD" }
];

export const sumValues = (column: SheetColumn): number => {
  let total = 0;
  column.values.forEach((value) => {
    total += parseAmount(value) ?? 0;
  });
  return total;
};

export const sumColumn = (sheet: Sheet, column: string): MetricResult<number> => {
  const result = requireColumn(sheet, column);
  return result.ok ? metricValue(sumValues(result.value)) : result;
};

export const totalFunding = (
  workbook: Workbook,
  sources: readonly FundingSource[] = FUNDING_SOURCES
): FundingTotal => {
  const terms = sources.map<FundingTerm>((source) => {
    const sheet = requireSheet(workbook, source.sheet);
    const amount = sheet.ok ? sumColumn(sheet.value, source.column) : sheet;
    return amount.ok
      ? { ...source, amount: amount.value, issue: null }
      : { ...source, amount: 0, issue: amount.issue };
  });
  return {
    total: terms.reduce((sum, term) => sum + term.amount, 0),
    terms
  };
};
