import { formatCount, formatCurrency } from "../../lib/format";
import type { RollupGroup } from "../../lib/metrics/rollup";

type RollupTableProps = {
  keyLabel: string;
  groups: RollupGroup[];
  sumLabel: string | null;
  flagColumns: readonly string[];
};

export const RollupTable = ({ keyLabel, groups, sumLabel, flagColumns }: RollupTableProps) => (
  <div className="table-scroll">
    <table className="data-table">
      <thead>
        <tr>
          <th>{keyLabel}</th>
          <th>Records</th>
          {sumLabel && <th>{sumLabel}</th>}
          {flagColumns.map((column) => (
            <th key={column}>{column}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {groups.map((group) => (
          <tr key={group.key}>
            <td>{group.key}</td>
            <td>{formatCount(group.count)}</td>
            {sumLabel && <td>{formatCurrency(group.sum)}</td>}
            {flagColumns.map((column) => (
              <td key={column}>{formatCount(group.flags[column] ?? 0)}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);
