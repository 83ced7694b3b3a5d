import { useEffect, useState } from "react";
import "./App.css";
import { OverviewScreen } from "./components/dashboard/OverviewScreen";
import { UploadPanel } from "./components/import/UploadPanel";
import { ProgramScreen } from "./components/programs/ProgramScreen";
import { useWorkbookSession } from "./components/session/useWorkbookSession";
import { findProgram, PROGRAMS } from "./lib/programs/registry";
import type { AuditEntry } from "./lib/session/session";

const OVERVIEW_PAGE_ID = "overview";

const pages = [
  { id: OVERVIEW_PAGE_ID, label: "Main Dashboard" },
  ...PROGRAMS.map((program) => ({ id: program.id, label: program.title }))
];

const formatTimestamp = (value: string): string => {
  const date = new Date(value);
  if (Number.isNaN(date.valueOf())) {
    return value;
  }
  return `${date.toLocaleDateString("en-US")} ${date.toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit"
  })}`;
};

const formatAuditPayload = (entry: AuditEntry): string => {
  const { payload } = entry;
  if (entry.type === "WORKBOOK_LOADED") {
    const source = typeof payload.source === "string" ? payload.source : "workbook";
    const sheets = typeof payload.sheets === "number" ? payload.sheets : 0;
    return `Loaded ${sheets} sheets from ${source}.`;
  }
  if (entry.type === "WORKBOOK_LOAD_FAILED") {
    return typeof payload.message === "string" ? payload.message : "Loading failed.";
  }
  if (entry.type === "CSV_EXPORTED") {
    const fileName = typeof payload.fileName === "string" ? payload.fileName : "export";
    const rows = typeof payload.rows === "number" ? payload.rows : 0;
    return `Exported ${rows} rows to ${fileName}.`;
  }
  return "Workbook cleared.";
};

function App() {
  const { snapshot, status, error, loadDefault, loadFile, reset, recordExport } =
    useWorkbookSession();
  const [activePageId, setActivePageId] = useState<string>(OVERVIEW_PAGE_ID);
  const activeProgram = findProgram(activePageId);

  useEffect(() => {
    void loadDefault();
  }, [loadDefault]);

  const renderContent = () => {
    if (!snapshot.workbook) {
      if (status === "idle" || status === "loading") {
        return <p className="muted">Loading data...</p>;
      }
      return (
        <UploadPanel
          error={error}
          loading={false}
          onFile={(file) => {
            void loadFile(file);
          }}
        />
      );
    }
    if (activeProgram) {
      return (
        <ProgramScreen
          key={activeProgram.id}
          program={activeProgram}
          workbook={snapshot.workbook}
          onExport={recordExport}
        />
      );
    }
    return <OverviewScreen workbook={snapshot.workbook} />;
  };

  return (
    <div className="app-shell">
      <aside className="sidebar">
        <h1 className="app-title">Broadband Funding Dashboard</h1>
        <label className="nav-select">
          Choose a page
          <select value={activePageId} onChange={(event) => setActivePageId(event.target.value)}>
            {pages.map((page) => (
              <option key={page.id} value={page.id}>
                {page.label}
              </option>
            ))}
          </select>
        </label>
        {snapshot.workbook && (
          <div className="source-card">
            <p className="muted">Loaded from</p>
            <p className="strong">{snapshot.source}</p>
            {error && <div className="callout error-callout">{error}</div>}
            <button type="button" className="ghost" onClick={reset}>
              Load a different file
            </button>
          </div>
        )}
        <div className="audit-list compact">
          {snapshot.audit.slice(0, 4).map((entry) => (
            <article key={entry.id} className="audit-card">
              <div className="audit-meta">
                <span>{formatTimestamp(entry.ts)}</span>
                <span className="tag">{entry.type}</span>
              </div>
              <p>{formatAuditPayload(entry)}</p>
            </article>
          ))}
        </div>
      </aside>
      <main className="main-content">{renderContent()}</main>
    </div>
  );
}

export default App;
