import type { LossPoint } from "@ftsub/shared";

export interface SmoothedLossPoint extends LossPoint {
  smoothed: number;
}

// {'loss': 1.2345, 'learning_rate': 4.99e-05, 'epoch': 0.02}
const DICT_LINE_RE = /\{[^{}]*'loss'\s*:[^{}]*\}/;
const NUMBER = String.raw`(-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)`;

function readField(line: string, field: string): number | undefined {
  const match = line.match(new RegExp(`'${field}'\\s*:\\s*${NUMBER}`));
  if (!match?.[1]) return undefined;
  const value = Number.parseFloat(match[1]);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Extract training loss from a trainer's stdout. Each logging step prints a
 * dict literal with a `loss` key; evaluation dicts (`eval_loss`) and the
 * final summary (`train_loss`) don't match and are skipped, as is every
 * other line (progress bars, warnings).
 *
 * Steps are numbered by order of appearance, starting at 1.
 */
export function parseTrainerLoss(output: string): LossPoint[] {
  const points: LossPoint[] = [];

  for (const raw of output.split(/\r?\n|\r/)) {
    const dict = raw.match(DICT_LINE_RE)?.[0];
    if (!dict) continue;

    const loss = readField(dict, "loss");
    if (loss === undefined) continue;

    const point: LossPoint = { step: points.length + 1, loss };
    const epoch = readField(dict, "epoch");
    if (epoch !== undefined) point.epoch = epoch;
    const learningRate = readField(dict, "learning_rate");
    if (learningRate !== undefined) point.learningRate = learningRate;

    points.push(point);
  }

  return points;
}

/**
 * Exponential moving average: s0 = v0, s_i = alpha * v_i + (1 - alpha) * s_{i-1}.
 */
export function exponentialSmoothing(
  values: number[],
  alpha: number,
): number[] {
  const smoothed: number[] = [];
  for (const value of values) {
    const prev = smoothed[smoothed.length - 1];
    smoothed.push(
      prev === undefined ? value : alpha * value + (1 - alpha) * prev,
    );
  }
  return smoothed;
}

export function smoothLoss(
  points: LossPoint[],
  alpha: number,
): SmoothedLossPoint[] {
  const smoothed = exponentialSmoothing(
    points.map((p) => p.loss),
    alpha,
  );
  return points.map((p, i) => ({ ...p, smoothed: smoothed[i] ?? p.loss }));
}

/**
 * Keep every n-th item (1-based: items n, 2n, ...) plus the last one, so a
 * thinned series still ends on the latest value.
 */
export function sampleEvery<T>(items: T[], every: number): T[] {
  if (every <= 1) return [...items];
  const sampled = items.filter((_, i) => (i + 1) % every === 0);
  const last = items[items.length - 1];
  if (last !== undefined && items.length % every !== 0) {
    sampled.push(last);
  }
  return sampled;
}
