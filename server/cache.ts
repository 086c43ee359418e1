import type { Dataset } from "../src/types";
import { loadDataset, type SourceOptions } from "./loader";

export type DatasetLoader = (options: SourceOptions) => Dataset;

function cacheKey(options: SourceOptions): string {
  return JSON.stringify([options.years.start, options.years.end, options.dataDir, options.filePattern]);
}

/**
 * Holds the canonical dataset for one source configuration.
 * Loaded on first use and reused until {@link DatasetCache.configure} changes the key.
 */
export class DatasetCache {
  private entry: { key: string; dataset: Dataset } | null = null;
  private options: SourceOptions;

  constructor(
    options: SourceOptions,
    private readonly load: DatasetLoader = loadDataset,
  ) {
    this.options = options;
  }

  /** Switch configuration; the held dataset is dropped only if the key differs. */
  configure(options: SourceOptions): void {
    this.options = options;
    if (this.entry && this.entry.key !== cacheKey(options)) this.entry = null;
  }

  /** The cached dataset, loading it first if needed. Load failures leave the cache empty. */
  get(): Dataset {
    const key = cacheKey(this.options);
    if (this.entry?.key === key) return this.entry.dataset;

    const dataset = this.load(this.options);
    this.entry = { key, dataset };
    const { start, end } = dataset.years;
    console.log(`Loaded ${dataset.observations.length} observations across ${dataset.locations.length} locations (${start}-${end})`);
    return dataset;
  }

  isLoaded(): boolean {
    return this.entry?.key === cacheKey(this.options);
  }
}
