import { useMemo, useState } from "react";
import { downloadCsv } from "../../lib/export/download";
import { filterRange, numericExtent, topN, type NumericRange } from "../../lib/metrics/filters";
import { isStateColumnName } from "../../lib/metrics/overview";
import { rollup, type RollupSort } from "../../lib/metrics/rollup";
import { requireSheet } from "../../lib/metrics/types";
import { readProgramMetrics } from "../../lib/programs/readings";
import type { ProgramDefinition } from "../../lib/programs/registry";
import { parseAmount } from "../../lib/workbook/coerce";
import { findColumn, numericColumnNames, selectRows, takeRows } from "../../lib/workbook/rows";
import type { Sheet, Workbook } from "../../lib/workbook/types";
import { formatDecimal } from "../../lib/format";
import { DataTable } from "../common/DataTable";
import { MetricCard } from "../common/MetricCard";
import { RollupTable } from "./RollupTable";

const PREVIEW_ROWS = 10;

type ProgramScreenProps = {
  program: ProgramDefinition;
  workbook: Workbook;
  onExport?: (sheet: Sheet, fileName: string) => void;
};

const rollupSortLabels: Record<RollupSort, string> = {
  "first-seen": "First seen",
  count: "Records",
  sum: "Amount"
};

const resolveRange = (
  minText: string,
  maxText: string,
  extent: NumericRange | null
): NumericRange | null => {
  if (!extent || (minText.trim() === "" && maxText.trim() === "")) {
    return null;
  }
  return {
    min: parseAmount(minText) ?? extent.min,
    max: parseAmount(maxText) ?? extent.max
  };
};

const ProgramDetails = ({
  program,
  sheet,
  onExport
}: {
  program: ProgramDefinition;
  sheet: Sheet;
  onExport?: (sheet: Sheet, fileName: string) => void;
}) => {
  const numericColumns = useMemo(() => numericColumnNames(sheet), [sheet]);
  const [filterColumn, setFilterColumn] = useState<string | null>(
    program.amountColumn && numericColumns.includes(program.amountColumn)
      ? program.amountColumn
      : numericColumns[0] ?? null
  );
  const [minText, setMinText] = useState("");
  const [maxText, setMaxText] = useState("");
  const [rollupSort, setRollupSort] = useState<RollupSort>(
    program.amountColumn ? "sum" : "count"
  );

  const readings = useMemo(() => readProgramMetrics(program, sheet), [program, sheet]);

  const extent = useMemo(() => {
    if (!filterColumn) {
      return null;
    }
    const result = numericExtent(sheet, filterColumn);
    return result.ok ? result.value : null;
  }, [sheet, filterColumn]);

  const range = resolveRange(minText, maxText, extent);

  const filtered = useMemo(() => {
    if (!filterColumn || !range) {
      return sheet;
    }
    const result = filterRange(sheet, filterColumn, range);
    return result.ok ? result.value : sheet;
  }, [sheet, filterColumn, range?.min, range?.max]);

  const stateColumn =
    program.stateColumn ??
    sheet.columns.find((column) => isStateColumnName(column.name))?.name ??
    null;
  const sumColumn =
    program.amountColumn && findColumn(sheet, program.amountColumn) ? program.amountColumn : null;
  const flagColumns = (program.flagColumns ?? []).filter((column) => findColumn(sheet, column));

  const rollupResult = useMemo(
    () =>
      stateColumn
        ? rollup(filtered, {
            by: stateColumn,
            sumColumn: sumColumn ?? undefined,
            flagColumns,
            sort: rollupSort
          })
        : null,
    [filtered, stateColumn, sumColumn, flagColumns.join("|"), rollupSort]
  );

  const ranked = useMemo(
    () => (filterColumn ? topN(filtered, { n: program.topN, by: filterColumn }) : null),
    [filtered, filterColumn, program.topN]
  );

  return (
    <div className="content-stack">
      <section className="metric-grid">
        {readings.map((reading) => (
          <MetricCard key={reading.label} label={reading.label} result={reading.result} />
        ))}
      </section>

      <section className="panel filter-panel">
        <header className="panel-header">
          <div>
            <h3>Filters</h3>
            <p className="meta">
              {filtered.rowCount} of {sheet.rowCount} records match.
            </p>
          </div>
        </header>
        {numericColumns.length === 0 ? (
          <p className="muted">No numeric columns to filter on.</p>
        ) : (
          <div className="filter-row">
            <label>
              Column
              <select
                value={filterColumn ?? ""}
                onChange={(event) => setFilterColumn(event.target.value || null)}
              >
                {numericColumns.map((name) => (
                  <option key={name} value={name}>
                    {name}
                  </option>
                ))}
              </select>
            </label>
            <label>
              Min
              <input
                type="text"
                inputMode="decimal"
                value={minText}
                placeholder={extent ? formatDecimal(extent.min) : ""}
                onChange={(event) => setMinText(event.target.value)}
              />
            </label>
            <label>
              Max
              <input
                type="text"
                inputMode="decimal"
                value={maxText}
                placeholder={extent ? formatDecimal(extent.max) : ""}
                onChange={(event) => setMaxText(event.target.value)}
              />
            </label>
          </div>
        )}
      </section>

      {stateColumn && rollupResult && (
        <section className="panel">
          <header className="panel-header">
            <div>
              <h3>By {stateColumn}</h3>
            </div>
            <select
              value={rollupSort}
              onChange={(event) => {
                const next = event.target.value;
                if (next === "first-seen" || next === "count" || next === "sum") {
                  setRollupSort(next);
                }
              }}
            >
              {Object.entries(rollupSortLabels).map(([value, label]) => (
                <option key={value} value={value}>
                  {label}
                </option>
              ))}
            </select>
          </header>
          {rollupResult.ok ? (
            <RollupTable
              keyLabel={stateColumn}
              groups={rollupResult.value}
              sumLabel={sumColumn}
              flagColumns={flagColumns}
            />
          ) : (
            <p className="muted">Data unavailable: {rollupResult.issue.message}</p>
          )}
        </section>
      )}

      {filterColumn && ranked && (
        <section className="panel">
          <header className="panel-header">
            <div>
              <h3>
                Top {program.topN} by {filterColumn}
              </h3>
            </div>
          </header>
          {ranked.ok ? (
            <DataTable
              sheet={selectRows(
                filtered,
                ranked.value.map((entry) => entry.rowIndex)
              )}
              maxRows={program.topN}
            />
          ) : (
            <p className="muted">Data unavailable: {ranked.issue.message}</p>
          )}
        </section>
      )}

      <section className="panel">
        <header className="panel-header">
          <div>
            <h3>Data preview</h3>
            <p className="meta">
              First {Math.min(PREVIEW_ROWS, filtered.rowCount)} of {filtered.rowCount} records.
            </p>
          </div>
          <button
            type="button"
            className="primary"
            disabled={filtered.rowCount === 0}
            onClick={() => {
              const fileName = downloadCsv(filtered);
              onExport?.(filtered, fileName);
            }}
          >
            Export CSV
          </button>
        </header>
        <DataTable sheet={takeRows(filtered, PREVIEW_ROWS)} maxRows={PREVIEW_ROWS} />
      </section>
    </div>
  );
};

export const ProgramScreen = ({ program, workbook, onExport }: ProgramScreenProps) => {
  const sheet = requireSheet(workbook, program.sheet);

  return (
    <section className="program-screen">
      <header className="page-header">
        <p className="eyebrow">Program</p>
        <h2>{program.title} Analysis</h2>
        {sheet.ok && (
          <p className="muted">
            Data loaded: {sheet.value.rowCount} records with {sheet.value.columns.length} columns
          </p>
        )}
      </header>
      {sheet.ok ? (
        <ProgramDetails program={program} sheet={sheet.value} onExport={onExport} />
      ) : (
        <div className="empty-state">
          <h3>Data unavailable</h3>
          <p>{sheet.issue.message}</p>
        </div>
      )}
    </section>
  );
};
