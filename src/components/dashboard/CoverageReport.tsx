import type { CoverageReport as CoverageReportData } from "../../lib/programs/coverage";

const statusLabel: Record<CoverageReportData["status"], string> = {
  clean: "All program sheets found",
  "needs-info": "Some program data is missing"
};

const statusTone: Record<CoverageReportData["status"], string> = {
  clean: "status-clean",
  "needs-info": "status-warning"
};

type CoverageReportProps = {
  report: CoverageReportData;
};

export const CoverageReport = ({ report }: CoverageReportProps) => (
  <section className="panel coverage-report">
    <header className="panel-header">
      <div>
        <h3>Program coverage</h3>
        <p className="meta">Expected sheets and columns for each program view.</p>
      </div>
      <span className={`status-pill ${statusTone[report.status]}`}>{statusLabel[report.status]}</span>
    </header>
    {report.findings.length > 0 && (
      <ul className="coverage-findings">
        {report.findings.map((finding) => (
          <li
            key={`${finding.programId}-${finding.code}-${finding.column ?? ""}`}
            className={`finding ${finding.severity}`}
          >
            <span className="tag">{finding.severity.toUpperCase()}</span>
            <div>
              <p className="finding-title">{finding.title}</p>
              <p className="meta">{finding.description}</p>
            </div>
          </li>
        ))}
      </ul>
    )}
  </section>
);
