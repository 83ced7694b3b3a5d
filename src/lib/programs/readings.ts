import { booleanRate } from "../metrics/booleanRate";
import { distinctCount } from "../metrics/filters";
import { sumColumn } from "../metrics/funding";
import { metricValue, type MetricResult } from "../metrics/types";
import { formatCount, formatCurrency, formatRate } from "../format";
import type { Sheet } from "../workbook/types";
import type { ProgramDefinition, ProgramMetric } from "./registry";

export type MetricReading = {
  label: string;
  result: MetricResult<string>;
};

const formatResult = <T>(result: MetricResult<T>, format: (value: T) => string): MetricResult<string> =>
  result.ok ? metricValue(format(result.value)) : result;

export const readMetric = (metric: ProgramMetric, sheet: Sheet): MetricResult<string> => {
  switch (metric.kind) {
    case "rows":
      return metricValue(formatCount(sheet.rowCount));
    case "sum":
      return formatResult(sumColumn(sheet, metric.column), formatCurrency);
    case "distinct":
      return formatResult(distinctCount(sheet, metric.column), formatCount);
    case "rate":
      return formatResult(booleanRate(sheet, metric.column), (rate) =>
        formatRate(rate.trueCount, rate.rate)
      );
  }
};

/** Each card is computed on its own; a missing column only affects its own card. */
export const readProgramMetrics = (program: ProgramDefinition, sheet: Sheet): MetricReading[] =>
  program.metrics.map((metric) => ({
    label: metric.label,
    result: readMetric(metric, sheet)
  }));
