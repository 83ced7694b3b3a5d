import { useMemo, useState } from "react";
import { formatDecimal } from "../../lib/format";
import { profileSheet } from "../../lib/metrics/profile";
import type { Workbook } from "../../lib/workbook/types";

type SheetProfilePanelProps = {
  workbook: Workbook;
};

const formatStat = (value: number | null | undefined): string =>
  value === null || value === undefined ? "–" : formatDecimal(value);

export const SheetProfilePanel = ({ workbook }: SheetProfilePanelProps) => {
  const [sheetName, setSheetName] = useState<string>(workbook.sheetNames[0] ?? "");
  const sheet = workbook.sheets.get(sheetName);
  const profile = useMemo(() => (sheet ? profileSheet(sheet) : null), [sheet]);

  return (
    <section className="panel profile-panel">
      <header className="panel-header">
        <div>
          <h3>Column profile</h3>
          <p className="meta">Detected column types, missing values and numeric statistics.</p>
        </div>
        <select value={sheetName} onChange={(event) => setSheetName(event.target.value)}>
          {workbook.sheetNames.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
      </header>
      {profile && (
        <div className="table-scroll">
          <p className="meta">
            {profile.rowCount} rows · {profile.columnCount} columns
          </p>
          <table className="data-table">
            <thead>
              <tr>
                <th>Column</th>
                <th>Type</th>
                <th>Missing</th>
                <th>Examples</th>
                <th>Mean</th>
                <th>Std</th>
                <th>Min</th>
                <th>Median</th>
                <th>Max</th>
              </tr>
            </thead>
            <tbody>
              {profile.columns.map((column) => (
                <tr key={column.name}>
                  <td>{column.name}</td>
                  <td>{column.kind}</td>
                  <td>{column.missingCount}</td>
                  <td>{column.examples.join(", ")}</td>
                  <td>{formatStat(column.stats?.mean)}</td>
                  <td>{formatStat(column.stats?.std)}</td>
                  <td>{formatStat(column.stats?.min)}</td>
                  <td>{formatStat(column.stats?.median)}</td>
                  <td>{formatStat(column.stats?.max)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </section>
  );
};
