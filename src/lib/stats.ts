import type { BoxStats, HistogramBin } from '../types';

export function presentValues(values: (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

/** Arithmetic mean of the present values; null when there are none. */
export function mean(values: (number | null)[]): number | null {
  const present = presentValues(values);
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

/** Quantile of an ascending-sorted array using linear interpolation between closest ranks. */
export function quantile(sorted: number[], q: number): number {
  if (sorted.length === 0) throw new RangeError('quantile of an empty sample');
  const pos = (sorted.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower);
}

/** Tukey box-plot summary: whiskers reach the furthest points within 1.5 × IQR. */
export function boxStats(values: (number | null)[]): BoxStats | null {
  const sorted = presentValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const fence = 1.5 * (q3 - q1);
  const inside = sorted.filter(v => v >= q1 - fence && v <= q3 + fence);

  return {
    count: sorted.length,
    min: sorted[0],
    q1,
    median: quantile(sorted, 0.5),
    q3,
    max: sorted[sorted.length - 1],
    lowerWhisker: inside[0],
    upperWhisker: inside[inside.length - 1],
    outliers: sorted.filter(v => v < q1 - fence || v > q3 + fence),
  };
}

/**
 * Pearson correlation over the positions where both samples are present.
 * Null when fewer than two pairs remain or either side has no variance.
 */
export function pearson(xs: (number | null)[], ys: (number | null)[]): number | null {
  const pairs: [number, number][] = [];
  const n = Math.min(xs.length, ys.length);
  for (let i = 0; i < n; i++) {
    const x = xs[i];
    const y = ys[i];
    if (x !== null && y !== null) pairs.push([x, y]);
  }
  if (pairs.length < 2) return null;

  const meanX = pairs.reduce((s, [x]) => s + x, 0) / pairs.length;
  const meanY = pairs.reduce((s, [, y]) => s + y, 0) / pairs.length;
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (const [x, y] of pairs) {
    cov += (x - meanX) * (y - meanY);
    varX += (x - meanX) ** 2;
    varY += (y - meanY) ** 2;
  }
  if (varX === 0 || varY === 0) return null;
  return cov / Math.sqrt(varX * varY);
}

/** Equal-width bins aligned to multiples of `width`, covering every present value. */
export function histogramBins(values: (number | null)[], width: number): HistogramBin[] {
  const present = presentValues(values);
  if (present.length === 0) return [];
  const first = Math.floor(Math.min(...present) / width) * width;
  const last = Math.floor(Math.max(...present) / width) * width;
  const bins: HistogramBin[] = [];
  for (let start = first; start <= last; start += width) bins.push({ start, end: start + width });
  return bins;
}

/** Count present values per bin; each bin is `[start, end)`. */
export function histogramCounts(values: (number | null)[], bins: HistogramBin[]): number[] {
  const counts = bins.map(() => 0);
  if (bins.length === 0) return counts;
  const width = bins[0].end - bins[0].start;
  for (const v of presentValues(values)) {
    const index = Math.floor((v - bins[0].start) / width);
    if (index >= 0 && index < counts.length) counts[index] += 1;
  }
  return counts;
}
