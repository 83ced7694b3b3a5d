export type ProgramMetric =
  | { kind: "rows"; label: string }
  | { kind: "sum"; label: string; column: string }
  | { kind: "distinct"; label: string; column: string }
  | { kind: "rate"; label: string; column: string };

export type ProgramDefinition = {
  id: string;
  /** Sheet name exactly as it appears in the workbook. */
  sheet: string;
  title: string;
  metrics: ProgramMetric[];
  stateColumn?: string;
  amountColumn?: string;
  flagColumns?: string[];
  topN: number;
};

const recordCount: ProgramMetric = { kind: "rows", label: "Total Records" };

export const PROGRAMS: readonly ProgramDefinition[] = [
  {
    id: "emergency-connectivity-fund",
    sheet: "Emergency Connectivity Fund",
    title: "Emergency Connectivity Fund",
    metrics: [
      { kind: "rows", label: "Total Applications" },
      { kind: "sum", label: "Total Funding Approved", column: "FRN Approved Amount" },
      { kind: "distinct", label: "States Covered", column: "Billed Entity State" },
      { kind: "distinct", label: "Unique Applicants", column: "Applicant Name" }
    ],
    stateColumn: "Billed Entity State",
    amountColumn: "FRN Approved Amount",
    topN: 10
  },
  {
    id: "e-rate",
    sheet: "E-Rate",
    title: "E-Rate",
    metrics: [
      recordCount,
      { kind: "sum", label: "Category 1 Funding", column: "Category1_Funding" },
      { kind: "sum", label: "Category 2 Funding", column: "Category2_Funding" }
    ],
    amountColumn: "Category1_Funding",
    topN: 10
  },
  {
    id: "public-housing-funding",
    sheet: "Public Housing Funding",
    title: "Public Housing Funding",
    metrics: [
      { kind: "rows", label: "Total Developments" },
      { kind: "sum", label: "Total Funding Awarded", column: "Award_Amount_USD" },
      { kind: "rate", label: "Connected Developments", column: "Connected" },
      { kind: "rate", label: "WiFi Available", column: "In_Building_WiFi" }
    ],
    amountColumn: "Award_Amount_USD",
    flagColumns: ["Connected", "In_Building_WiFi"],
    topN: 20
  },
  { id: "lifeline-program", sheet: "Lifeline Program", title: "Lifeline Program", metrics: [recordCount], topN: 10 },
  { id: "grants-gov", sheet: "Grants.Gov", title: "Grants.Gov", metrics: [recordCount], topN: 10 },
  {
    id: "ftia-funding-report",
    sheet: "FTIA Funding Report",
    title: "FTIA Funding Report",
    metrics: [recordCount],
    topN: 10
  },
  { id: "tp-cap-fund", sheet: "TP Cap Fund", title: "TP Cap Fund", metrics: [recordCount], topN: 10 },
  { id: "marketing", sheet: "Marketing", title: "Marketing", metrics: [recordCount], topN: 20 },
  { id: "990-breakdown", sheet: "990Breakdown", title: "990 Breakdown", metrics: [recordCount], topN: 20 },
  { id: "news", sheet: "NEWS", title: "News", metrics: [recordCount], topN: 20 }
];

export const findProgram = (id: string): ProgramDefinition | undefined =>
  PROGRAMS.find((program) => program.id === id);

/** Every column a program view reads, in first-use order. */
export const programColumns = (program: ProgramDefinition): string[] => {
  const names = [
    ...program.metrics.flatMap((metric) => (metric.kind === "rows" ? [] : [metric.column])),
    ...(program.stateColumn ? [program.stateColumn] : []),
    ...(program.amountColumn ? [program.amountColumn] : []),
    ...(program.flagColumns ?? [])
  ];
  return Array.from(new Set(names));
};
