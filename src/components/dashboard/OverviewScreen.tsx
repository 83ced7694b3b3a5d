import { useMemo } from "react";
import { formatCount, formatCurrency } from "../../lib/format";
import { summarizeWorkbook } from "../../lib/metrics/overview";
import { metricValue } from "../../lib/metrics/types";
import { checkProgramCoverage } from "../../lib/programs/coverage";
import { PROGRAMS } from "../../lib/programs/registry";
import type { Workbook } from "../../lib/workbook/types";
import { MetricCard } from "../common/MetricCard";
import { CoverageReport } from "./CoverageReport";
import { SheetProfilePanel } from "./SheetProfilePanel";

type OverviewScreenProps = {
  workbook: Workbook;
};

export const OverviewScreen = ({ workbook }: OverviewScreenProps) => {
  const summary = useMemo(() => summarizeWorkbook(workbook), [workbook]);
  const coverage = useMemo(() => checkProgramCoverage(workbook, PROGRAMS), [workbook]);

  return (
    <div className="content-stack">
      <section className="metric-grid">
        <MetricCard
          label="Total Funding Amount"
          result={metricValue(formatCurrency(summary.funding.total))}
        />
        <MetricCard label="Data Sources" result={metricValue(formatCount(summary.sheetCount))} />
        <MetricCard label="Total Records" result={metricValue(formatCount(summary.recordCount))} />
        <MetricCard
          label="States Covered"
          result={metricValue(formatCount(summary.statesCovered))}
        />
      </section>

      <section className="panel">
        <header className="panel-header">
          <div>
            <h3>Funding by source</h3>
            <p className="meta">Each source counts on its own; a missing one adds nothing.</p>
          </div>
        </header>
        <ul className="funding-terms">
          {summary.funding.terms.map((term) => (
            <li key={`${term.sheet}-${term.column}`}>
              <span>
                {term.sheet} · {term.column}
              </span>
              <strong title={term.issue?.message}>
                {term.issue ? "Data unavailable" : formatCurrency(term.amount)}
              </strong>
            </li>
          ))}
        </ul>
      </section>

      <section className="panel">
        <header className="panel-header">
          <div>
            <h3>Data overview</h3>
          </div>
        </header>
        <div className="table-scroll">
          <table className="data-table">
            <thead>
              <tr>
                <th>Sheet Name</th>
                <th>Records</th>
                <th>Columns</th>
                <th>Sample Columns</th>
              </tr>
            </thead>
            <tbody>
              {summary.sheets.map((sheet) => (
                <tr key={sheet.name}>
                  <td>{sheet.name}</td>
                  <td>{formatCount(sheet.records)}</td>
                  <td>{sheet.columns}</td>
                  <td>{sheet.sampleColumns}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </section>

      <CoverageReport report={coverage} />
      <SheetProfilePanel workbook={workbook} />
    </div>
  );
};
