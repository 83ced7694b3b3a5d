import type { MetricResult } from "../../lib/metrics/types";

type MetricCardProps = {
  label: string;
  result: MetricResult<string>;
};

export const MetricCard = ({ label, result }: MetricCardProps) => (
  <article className="metric-card" aria-label={label}>
    <p className="metric-label">{label}</p>
    {result.ok ? (
      <strong className="metric-value">{result.value}</strong>
    ) : (
      <strong className="metric-value unavailable" title={result.issue.message}>
        Data unavailable
      </strong>
    )}
  </article>
);
