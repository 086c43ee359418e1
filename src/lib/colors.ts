export const SERIES_COLORS = [
  '#10b981', '#3b82f6', '#f59e0b', '#ef4444', '#8b5cf6', '#06b6d4',
  '#ec4899', '#84cc16', '#f97316', '#6366f1', '#14b8a6', '#a855f7',
];

export function seriesColor(index: number): string {
  return SERIES_COLORS[index % SERIES_COLORS.length];
}

type Rgb = [number, number, number];

// teal → rose for magnitudes; green → yellow → red for correlations
const SEQUENTIAL: Rgb[] = [[209, 238, 234], [104, 171, 184], [42, 86, 116], [180, 80, 120], [230, 48, 90]];
const DIVERGING: Rgb[] = [[26, 152, 80], [254, 224, 139], [215, 48, 39]];

function toHex([r, g, b]: Rgb): string {
  return `#${[r, g, b].map(c => Math.round(c).toString(16).padStart(2, '0')).join('')}`;
}

/** Interpolated colour for a heatmap cell; `null` cells are light grey. */
export function heatColor(value: number | null, [min, max]: [number, number], palette: 'sequential' | 'diverging'): string {
  if (value === null) return '#f1f5f9';
  const stops = palette === 'sequential' ? SEQUENTIAL : DIVERGING;
  const t = max === min ? 0 : Math.min(1, Math.max(0, (value - min) / (max - min)));
  const pos = t * (stops.length - 1);
  const i = Math.min(Math.floor(pos), stops.length - 2);
  const f = pos - i;
  const [a, b] = [stops[i], stops[i + 1]];
  return toHex([a[0] + (b[0] - a[0]) * f, a[1] + (b[1] - a[1]) * f, a[2] + (b[2] - a[2]) * f]);
}
