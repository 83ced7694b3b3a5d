import { formatDecimal } from "../../lib/format";
import { cellAt } from "../../lib/workbook/rows";
import type { CellValue, Sheet } from "../../lib/workbook/types";

type DataTableProps = {
  sheet: Sheet;
  maxRows?: number;
  rowLabels?: string[];
};

const formatCell = (cell: CellValue): string => {
  if (cell === null) {
    return "";
  }
  if (typeof cell === "number") {
    return formatDecimal(cell);
  }
  return String(cell);
};

export const DataTable = ({ sheet, maxRows = 10, rowLabels }: DataTableProps) => {
  const rowCount = Math.min(sheet.rowCount, maxRows);

  if (sheet.columns.length === 0) {
    return <p className="muted">This sheet has no columns.</p>;
  }

  return (
    <div className="table-scroll">
      <table className="data-table">
        <thead>
          <tr>
            <th className="row-index">#</th>
            {sheet.columns.map((column) => (
              <th key={column.name} className={`kind-${column.kind}`}>
                {column.name}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {Array.from({ length: rowCount }, (_, rowIndex) => (
            <tr key={`row-${rowIndex}`}>
              <td className="row-index">{rowLabels?.[rowIndex] ?? rowIndex + 1}</td>
              {sheet.columns.map((column) => (
                <td key={`cell-${rowIndex}-${column.name}`}>
                  {formatCell(cellAt(column, rowIndex))}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      {rowCount === 0 && <p className="muted">No rows to show.</p>}
    </div>
  );
};
