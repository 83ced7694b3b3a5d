import { parseAmount, toBooleanFlag } from "../workbook/coerce";
import { cellAt, cellKey } from "../workbook/rows";
import type { Sheet } from "../workbook/types";
import { metricValue, requireColumn, requireColumns, type MetricResult } from "./types";

export type RollupSort = "first-seen" | "count" | "sum";

export type RollupOptions = {
  by: string;
  sumColumn?: string;
  flagColumns?: readonly string[];
  sort?: RollupSort;
};

export type RollupGroup = {
  key: string;
  count: number;
  sum: number;
  flags: Record<string, number>;
};

export const rollup = (sheet: Sheet, options: RollupOptions): MetricResult<RollupGroup[]> => {
  const keyColumn = requireColumn(sheet, options.by);
  if (!keyColumn.ok) {
    return keyColumn;
  }
  const sumColumn = options.sumColumn ? requireColumn(sheet, options.sumColumn) : null;
  if (sumColumn && !sumColumn.ok) {
    return sumColumn;
  }
  const flagNames = options.flagColumns ?? [];
  const flagColumns = requireColumns(sheet, flagNames);
  if (!flagColumns.ok) {
    return flagColumns;
  }

  const groups = new Map<string, RollupGroup>();
  for (let rowIndex = 0; rowIndex < sheet.rowCount; rowIndex += 1) {
    const key = cellKey(cellAt(keyColumn.value, rowIndex));
    if (!key) {
      continue;
    }
    const group = groups.get(key) ?? {
      key,
      count: 0,
      sum: 0,
      flags: Object.fromEntries(flagNames.map((name) => [name, 0]))
    };
    group.count += 1;
    if (sumColumn) {
      group.sum += parseAmount(cellAt(sumColumn.value, rowIndex)) ?? 0;
    }
    flagColumns.value.forEach((column) => {
      if (toBooleanFlag(cellAt(column, rowIndex)) === true) {
        group.flags[column.name] += 1;
      }
    });
    groups.set(key, group);
  }

  const ordered = Array.from(groups.values());
  const sort = options.sort ?? "first-seen";
  if (sort === "count") {
    ordered.sort((a, b) => b.count - a.count);
  } else if (sort === "sum") {
    ordered.sort((a, b) => b.sum - a.sum);
  }
  return metricValue(ordered);
};
