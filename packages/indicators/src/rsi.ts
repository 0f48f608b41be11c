import {
  assertPeriod,
  createWarmupSeries,
  withSentinel,
  type WarmupSeries,
} from "@marketlens/core";

export function rsiSeries(values: readonly number[], period = 14): WarmupSeries {
  assertPeriod(period, "RSI");
  const rsis = createWarmupSeries(values.length);

  if (values.length < period + 1) {
    return rsis;
  }

  const gains = new Array<number>(values.length).fill(0);
  const losses = new Array<number>(values.length).fill(0);

  for (let i = 1; i < values.length; i += 1) {
    const change = values[i] - values[i - 1];
    if (change > 0) {
      gains[i] = change;
    } else {
      losses[i] = -change;
    }
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i += 1) {
    avgGain += gains[i];
    avgLoss += losses[i];
  }
  avgGain /= period;
  avgLoss /= period;

  // Smoothing starts at `period` itself, so the last seed change is folded in twice.
  const alpha = 1 / period;
  for (let i = period; i < values.length; i += 1) {
    avgGain = avgGain * (1 - alpha) + gains[i] * alpha;
    avgLoss = avgLoss * (1 - alpha) + losses[i] * alpha;

    rsis[i] = avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss);
  }

  return rsis;
}

export function rsi(values: readonly number[], period = 14): number[] {
  return withSentinel(rsiSeries(values, period));
}
