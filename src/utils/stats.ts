export interface FitMetrics {
  r2: number;
  rmse: number;
  mae: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Population variance
export function variance(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
}

export function std(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

// Median absolute deviation from the median
export function medianAbsoluteDeviation(values: readonly number[]): number {
  const center = median(values);
  return median(values.map(v => Math.abs(v - center)));
}

export function countDistinct(values: readonly number[]): number {
  return new Set(values).size;
}

export function calculateMetrics(actuals: readonly number[], predictions: readonly number[]): FitMetrics {
  const n = actuals.length;
  if (n === 0) return { r2: NaN, rmse: NaN, mae: NaN };

  const mae = actuals.reduce((sum, a, i) => sum + Math.abs(a - predictions[i]), 0) / n;
  const ssResidual = actuals.reduce((sum, a, i) => sum + (a - predictions[i]) ** 2, 0);
  const rmse = Math.sqrt(ssResidual / n);

  const m = mean(actuals);
  const ssTotal = actuals.reduce((sum, a) => sum + (a - m) ** 2, 0);
  // A constant target is explained perfectly only by a perfect fit
  const r2 = ssTotal === 0 ? (ssResidual === 0 ? 1 : 0) : 1 - ssResidual / ssTotal;

  return { r2, rmse, mae };
}
