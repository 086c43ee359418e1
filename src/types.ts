/** Inclusive range of years covered by the dataset. */
export interface YearRange {
  start: number;
  end: number;
}

/** One monthly AQI reading for a monitoring location (long format). */
export interface Observation {
  location: string;
  month: string;
  year: number;
  aqi: number | null;
  /** ISO calendar date (`YYYY-MM-01`) derived from year and month. */
  date: string;
}

/** The canonical, date-sorted observation set for a year range. */
export interface Dataset {
  readonly years: YearRange;
  /** Union of location columns across all years, in first-seen order. */
  readonly locations: readonly string[];
  readonly observations: readonly Observation[];
}

export const CATEGORY_NAMES = ['GOOD', 'SATISFACTORY', 'MODERATE', 'POOR', 'VERY POOR', 'SEVERE'] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

/** A named AQI band; bounds are inclusive, `upperBound` is null when unbounded. */
export interface AqiCategory {
  name: CategoryName;
  lowerBound: number;
  upperBound: number | null;
  color: string;
}

/** Occurrence counts of a category, rows by location and columns by year. */
export interface CategoryCountTable {
  locations: string[];
  years: number[];
  rows: { location: string; counts: number[] }[];
}

export interface CategoryResult {
  category: AqiCategory;
  observations: Observation[];
  counts: CategoryCountTable;
}

export const VIEW_IDS = [
  'overview',
  'annual-trends',
  'seasonal-patterns',
  'monthly-variations',
  'location-comparison',
  'pollution-hotspots',
  'time-series',
  'correlation',
  'distribution',
  'yearly-trend',
  'category-analysis',
] as const;

export type ViewId = (typeof VIEW_IDS)[number];

/** User input a view may depend on. */
export interface ViewSelection {
  category?: string;
}

export interface ViewSummary {
  id: ViewId;
  title: string;
  caption: string;
}

export interface BoxStats {
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  lowerWhisker: number;
  upperWhisker: number;
  outliers: number[];
}

export interface BoxSeries {
  name: string;
  boxes: { x: string; stats: BoxStats }[];
}

export interface LineSeries {
  name: string;
  points: { x: string | number; y: number | null }[];
}

export interface HistogramBin {
  start: number;
  end: number;
}

export type ChartSpec =
  | { kind: 'summary'; title: string; paragraphs: string[]; facts: { label: string; value: string }[] }
  | { kind: 'box'; title: string; xLabel: string; series: BoxSeries[] }
  | { kind: 'line'; title: string; xLabel: string; series: LineSeries[] }
  | {
      kind: 'heatmap';
      title: string;
      rows: string[];
      columns: string[];
      values: (number | null)[][];
      domain: [number, number];
      palette: 'sequential' | 'diverging';
    }
  | { kind: 'histogram'; title: string; bins: HistogramBin[]; series: { name: string; counts: number[] }[] }
  | { kind: 'category'; title: string; result: CategoryResult; categories: AqiCategory[] };

/** Response shape of `GET /api/dataset`. */
export interface DatasetInfo {
  years: YearRange;
  locations: string[];
  count: number;
}
