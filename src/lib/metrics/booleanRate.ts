import { toBooleanFlag } from "../workbook/coerce";
import type { Sheet } from "../workbook/types";
import { metricValue, requireColumn, type MetricResult } from "./types";

export type BooleanRate = {
  trueCount: number;
  falseCount: number;
  unknownCount: number;
  knownCount: number;
  /** Percentage of known values that are true, one decimal; null when nothing is known. */
  rate: number | null;
};

export const roundToOneDecimal = (value: number): number => Math.round(value * 10) / 10;

export const booleanRate = (sheet: Sheet, column: string): MetricResult<BooleanRate> => {
  const result = requireColumn(sheet, column);
  if (!result.ok) {
    return result;
  }

  let trueCount = 0;
  let falseCount = 0;
  let unknownCount = 0;
  result.value.values.forEach((value) => {
    const flag = toBooleanFlag(value);
    if (flag === true) {
      trueCount += 1;
    } else if (flag === false) {
      falseCount += 1;
    } else {
      unknownCount += 1;
    }
  });

  const knownCount = trueCount + falseCount;
  return metricValue({
    trueCount,
    falseCount,
    unknownCount,
    knownCount,
    rate: knownCount === 0 ? null : roundToOneDecimal((trueCount / knownCount) * 100)
  });
};
