const currencyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  maximumFractionDigits: 0
});

const integerFormatter = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

const decimalFormatter = new Intl.NumberFormat("en-US", { maximumFractionDigits: 2 });

export const formatCurrency = (value: number): string => currencyFormatter.format(value);

export const formatCount = (value: number): string => integerFormatter.format(value);

export const formatDecimal = (value: number): string => decimalFormatter.format(value);

export const formatRate = (count: number, rate: number | null): string =>
  rate === null ? `${formatCount(count)} (n/a)` : `${formatCount(count)} (${rate.toFixed(1)}%)`;
