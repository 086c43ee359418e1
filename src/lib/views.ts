import type {
  BoxSeries,
  ChartSpec,
  Dataset,
  LineSeries,
  Observation,
  ViewId,
  ViewSelection,
  ViewSummary,
} from '../types';
import { VIEW_IDS } from '../types';
import { AQI_CATEGORIES, classifyByCategory } from './categories';
import { MONTHS } from './months';
import { boxStats, histogramBins, histogramCounts, mean, pearson } from './stats';

export const HISTOGRAM_BIN_WIDTH = 25;
export const DEFAULT_CATEGORY = 'GOOD';

interface ViewDefinition extends ViewSummary {
  build: (dataset: Dataset, selection: ViewSelection) => ChartSpec;
}

function groupBy<K>(items: readonly Observation[], keyOf: (obs: Observation) => K): Map<K, Observation[]> {
  const groups = new Map<K, Observation[]>();
  for (const obs of items) {
    const key = keyOf(obs);
    const group = groups.get(key);
    if (group) group.push(obs);
    else groups.set(key, [obs]);
  }
  return groups;
}

const aqiOf = (group: readonly Observation[] | undefined) => (group ?? []).map(o => o.aqi);

function yearsOf(dataset: Dataset): number[] {
  const years: number[] = [];
  for (let y = dataset.years.start; y <= dataset.years.end; y++) years.push(y);
  return years;
}

/** Locations with at least one reading, in lexical order. */
function reportingLocations(dataset: Dataset): string[] {
  const withValues = new Set(dataset.observations.filter(o => o.aqi !== null).map(o => o.location));
  return [...withValues].sort();
}

function boxSeries(name: string, keys: string[], groups: Map<string, Observation[]>): BoxSeries {
  const boxes: BoxSeries['boxes'] = [];
  for (const key of keys) {
    const stats = boxStats(aqiOf(groups.get(key)));
    if (stats) boxes.push({ x: key, stats });
  }
  return { name, boxes };
}

function valueDomain(values: (number | null)[][]): [number, number] {
  const present = values.flat().filter((v): v is number => v !== null);
  if (present.length === 0) return [0, 0];
  return [Math.min(...present), Math.max(...present)];
}

const VIEWS: Record<ViewId, ViewDefinition> = {
  overview: {
    id: 'overview',
    title: 'Overview',
    caption: 'Monthly AQI readings for every monitoring location. Pick a view from the sidebar.',
    build: dataset => {
      const { start, end } = dataset.years;
      const readings = dataset.observations.filter(o => o.aqi !== null);
      const average = mean(readings.map(o => o.aqi));
      return {
        kind: 'summary',
        title: 'Overview',
        paragraphs: [
          `Air quality across ${dataset.locations.length} monitoring locations from ${start} to ${end}.`,
          'Each observation is one monthly AQI reading for one location.',
        ],
        facts: [
          { label: 'Years', value: `${start}–${end}` },
          { label: 'Locations', value: String(dataset.locations.length) },
          { label: 'Observations', value: String(dataset.observations.length) },
          { label: 'Missing readings', value: String(dataset.observations.length - readings.length) },
          { label: 'Mean AQI', value: average === null ? '—' : average.toFixed(1) },
        ],
      };
    },
  },
  'annual-trends': {
    id: 'annual-trends',
    title: 'Annual Trends',
    caption: 'Spread of AQI within each year: median line, quartile box, whiskers and outliers.',
    build: dataset => {
      const groups = groupBy(dataset.observations, o => String(o.year));
      return {
        kind: 'box',
        title: 'Annual Air Quality Trends',
        xLabel: 'Year',
        series: [boxSeries('AQI', yearsOf(dataset).map(String), groups)],
      };
    },
  },
  'seasonal-patterns': {
    id: 'seasonal-patterns',
    title: 'Seasonal Patterns',
    caption: 'AQI by calendar month, one colour per year. Repeating shapes point to seasonal effects.',
    build: dataset => ({
      kind: 'box',
      title: 'Seasonal Air Quality Patterns',
      xLabel: 'Month',
      series: yearsOf(dataset).map(year => {
        const groups = groupBy(dataset.observations.filter(o => o.year === year), o => o.month);
        return boxSeries(String(year), [...MONTHS], groups);
      }),
    }),
  },
  'monthly-variations': {
    id: 'monthly-variations',
    title: 'Month-to-month Variations',
    caption: 'Mean AQI over all locations for each month, one line per year.',
    build: dataset => ({
      kind: 'line',
      title: 'Monthly Air Quality Variations',
      xLabel: 'Date',
      series: yearsOf(dataset).map(year => {
        const byDate = groupBy(dataset.observations.filter(o => o.year === year), o => o.date);
        return {
          name: String(year),
          points: [...byDate].map(([date, group]) => ({ x: date, y: mean(aqiOf(group)) })),
        };
      }),
    }),
  },
  'location-comparison': {
    id: 'location-comparison',
    title: 'Location Comparison',
    caption: 'AQI distribution per location over the whole period.',
    build: dataset => ({
      kind: 'box',
      title: 'Air Quality Comparison Across Locations',
      xLabel: 'Location',
      series: [boxSeries('AQI', [...dataset.locations], groupBy(dataset.observations, o => o.location))],
    }),
  },
  'pollution-hotspots': {
    id: 'pollution-hotspots',
    title: 'Pollution Hotspots',
    caption: 'Mean AQI per location and year. Darker cells mark persistent hotspots.',
    build: dataset => {
      const rows = reportingLocations(dataset);
      const readings = dataset.observations.filter(o => o.aqi !== null);
      const columns = [...new Set(readings.map(o => o.year))].sort((a, b) => a - b);
      const cells = groupBy(readings, o => `${o.location}\u0000${o.year}`);
      const values = rows.map(location => columns.map(year => mean(aqiOf(cells.get(`${location}\u0000${year}`)))));
      return {
        kind: 'heatmap',
        title: 'Pollution Hotspots Heatmap',
        rows,
        columns: columns.map(String),
        values,
        domain: valueDomain(values),
        palette: 'sequential',
      };
    },
  },
  'time-series': {
    id: 'time-series',
    title: 'Time Series',
    caption: 'Monthly AQI for each location. Toggle locations from the legend.',
    build: dataset => {
      const byLocation = groupBy(dataset.observations, o => o.location);
      const series: LineSeries[] = dataset.locations.map(location => ({
        name: location,
        points: (byLocation.get(location) ?? []).map(o => ({ x: o.date, y: o.aqi })),
      }));
      return { kind: 'line', title: 'Air Quality Time Series by Location', xLabel: 'Date', series };
    },
  },
  correlation: {
    id: 'correlation',
    title: 'Correlation Analysis',
    caption: 'Pearson correlation of monthly AQI between locations. Values near 1 move together.',
    build: dataset => {
      const locations = reportingLocations(dataset);
      const dates = [...new Set(dataset.observations.map(o => o.date))].sort();
      const cells = groupBy(dataset.observations, o => `${o.location}\u0000${o.date}`);
      const columns = new Map<string, (number | null)[]>(
        locations.map(location => [location, dates.map(date => mean(aqiOf(cells.get(`${location}\u0000${date}`))))]),
      );
      const values = locations.map(a => locations.map(b => pearson(columns.get(a) ?? [], columns.get(b) ?? [])));
      return {
        kind: 'heatmap',
        title: 'Correlation Heatmap of Air Quality Across Locations',
        rows: locations,
        columns: locations,
        values,
        domain: [-1, 1],
        palette: 'diverging',
      };
    },
  },
  distribution: {
    id: 'distribution',
    title: 'AQI Distribution',
    caption: `Count of monthly readings per ${HISTOGRAM_BIN_WIDTH}-point AQI bin, stacked by location.`,
    build: dataset => {
      const bins = histogramBins(aqiOf(dataset.observations), HISTOGRAM_BIN_WIDTH);
      const byLocation = groupBy(dataset.observations, o => o.location);
      return {
        kind: 'histogram',
        title: 'Distribution of AQI Values by Location',
        bins,
        series: dataset.locations.map(location => ({
          name: location,
          counts: histogramCounts(aqiOf(byLocation.get(location)), bins),
        })),
      };
    },
  },
  'yearly-trend': {
    id: 'yearly-trend',
    title: 'Yearly Average Trend',
    caption: 'Mean AQI over all locations and months, per year.',
    build: dataset => {
      const byYear = groupBy(dataset.observations, o => o.year);
      return {
        kind: 'line',
        title: 'Yearly Average AQI Trend',
        xLabel: 'Year',
        series: [{ name: 'Mean AQI', points: yearsOf(dataset).map(year => ({ x: year, y: mean(aqiOf(byYear.get(year))) })) }],
      };
    },
  },
  'category-analysis': {
    id: 'category-analysis',
    title: 'AQI Category Analysis',
    caption: 'Pick a category to list the months it was observed and count them per location and year.',
    build: (dataset, selection) => {
      const result = classifyByCategory(dataset, selection.category ?? DEFAULT_CATEGORY);
      return {
        kind: 'category',
        title: `AQI Category: ${result.category.name}`,
        result,
        categories: [...AQI_CATEGORIES],
      };
    },
  },
};

export function isViewId(value: string): value is ViewId {
  return VIEW_IDS.some(id => id === value);
}

export function listViews(): ViewSummary[] {
  return VIEW_IDS.map(id => ({ id, title: VIEWS[id].title, caption: VIEWS[id].caption }));
}

/** Build the chart specification for a view; never mutates the dataset. */
export function buildView(id: ViewId, dataset: Dataset, selection: ViewSelection = {}): ChartSpec {
  return VIEWS[id].build(dataset, selection);
}
