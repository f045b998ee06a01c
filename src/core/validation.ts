export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

export const isPositiveFinite = (value: number | undefined): value is number =>
  value !== undefined && Number.isFinite(value) && value > 0;

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/** Population standard deviation. */
export const stdDev = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
};

/** Rounds to 4 decimals so formula outputs like 0.7 + 0.07 * 3 compare exactly. */
export const roundConfidence = (value: number): number => Number(value.toFixed(4));

export const formatPercent = (value: number, digits = 0): string => `${(value * 100).toFixed(digits)}%`;

export const formatUsdMillions = (value: number): string => `$${(value / 1e6).toFixed(0)}M`;
