import { findColumn } from "../workbook/rows";
import type { Workbook } from "../workbook/types";
import { programColumns, type ProgramDefinition } from "./registry";

export type CoverageSeverity = "info" | "warn";

export type CoverageStatus = "clean" | "needs-info";

export type CoverageCode = "MISSING_SHEET" | "MISSING_COLUMN" | "EMPTY_SHEET";

export type CoverageFinding = {
  code: CoverageCode;
  severity: CoverageSeverity;
  programId: string;
  sheet: string;
  column?: string;
  title: string;
  description: string;
};

export type CoverageReport = {
  status: CoverageStatus;
  findings: CoverageFinding[];
};

export const checkProgramSheet = (
  workbook: Workbook,
  program: ProgramDefinition
): CoverageFinding[] => {
  const sheet = workbook.sheets.get(program.sheet);
  if (!sheet) {
    return [
      {
        code: "MISSING_SHEET",
        severity: "warn",
        programId: program.id,
        sheet: program.sheet,
        title: `${program.title} sheet not found`,
        description: `No sheet named "${program.sheet}" was found. Metrics for this program are unavailable.`
      }
    ];
  }

  const findings = programColumns(program)
    .filter((column) => !findColumn(sheet, column))
    .map<CoverageFinding>((column) => ({
      code: "MISSING_COLUMN",
      severity: "warn",
      programId: program.id,
      sheet: program.sheet,
      column,
      title: `Column "${column}" missing`,
      description: `Metrics that read "${column}" in "${program.sheet}" show as unavailable.`
    }));

  if (sheet.rowCount === 0) {
    findings.push({
      code: "EMPTY_SHEET",
      severity: "info",
      programId: program.id,
      sheet: program.sheet,
      title: `${program.title} has no rows`,
      description: "The sheet only contains a header row."
    });
  }
  return findings;
};

export const resolveCoverageStatus = (findings: CoverageFinding[]): CoverageStatus =>
  findings.length > 0 ? "needs-info" : "clean";

export const checkProgramCoverage = (
  workbook: Workbook,
  programs: readonly ProgramDefinition[]
): CoverageReport => {
  const findings = programs.flatMap((program) => checkProgramSheet(workbook, program));
  return {
    status: resolveCoverageStatus(findings),
    findings
  };
};
