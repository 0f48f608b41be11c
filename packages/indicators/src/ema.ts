import {
  assertPeriod,
  average,
  createWarmupSeries,
  withSentinel,
  type WarmupSeries,
} from "@marketlens/core";

export function emaSeries(values: readonly number[], length: number): WarmupSeries {
  assertPeriod(length, "EMA");
  const series = createWarmupSeries(values.length);

  if (values.length < length) {
    return series;
  }

  const multiplier = 2 / (length + 1);
  let emaValue = average(values.slice(0, length));
  series[length - 1] = emaValue;

  for (let i = length; i < values.length; i += 1) {
    emaValue = (values[i] - emaValue) * multiplier + emaValue;
    series[i] = emaValue;
  }

  return series;
}

/** EMA aligned with `values`; the first `length - 1` positions read 0. */
export function ema(values: readonly number[], length: number): number[] {
  return withSentinel(emaSeries(values, length));
}
