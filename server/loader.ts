import fs from "fs";
import path from "path";
import Papa from "papaparse";
import type { Dataset, Observation, YearRange } from "../src/types";
import { DateParseError, MissingSourceError } from "../src/lib/errors";
import { monthDate, normalizeMonth, type Month } from "../src/lib/months";

/** Where the per-year tables live: `dataDir/filePattern` with `{year}` substituted. */
export interface SourceOptions {
  years: YearRange;
  dataDir: string;
  filePattern: string;
}

/** One year's wide table: a row per month, a value per location column. */
export interface YearTable {
  year: number;
  path: string;
  locations: string[];
  rows: { month: Month; values: Map<string, number | null> }[];
}

const MONTH_COLUMN = "Month";
// Attached by the loader; a source column of the same name is not a location.
const YEAR_COLUMN = "Year";

export function sourcePath(options: SourceOptions, year: number): string {
  return path.join(options.dataDir, options.filePattern.replaceAll("{year}", String(year)));
}

/** Blank and non-numeric cells are absent readings. */
export function parseCell(raw: string | undefined): number | null {
  const text = raw?.trim() ?? "";
  if (text === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function readYearTable(year: number, filePath: string): YearTable {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new MissingSourceError(year, filePath, err);
  }

  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.replace(/^\uFEFF/, "").trim(),
  });

  const quoteError = parsed.errors.find(e => e.type === "Quotes");
  if (quoteError) {
    throw new MissingSourceError(year, filePath, new Error(`malformed CSV at row ${(quoteError.row ?? 0) + 1}: ${quoteError.message}`));
  }

  const fields = parsed.meta.fields ?? [];
  if (!fields.includes(MONTH_COLUMN)) {
    throw new MissingSourceError(year, filePath, new Error(`no "${MONTH_COLUMN}" column`));
  }

  const locations = fields.filter(f => f !== "" && f !== MONTH_COLUMN && f !== YEAR_COLUMN);

  const rows = parsed.data.map((record, index) => {
    const rawMonth = record[MONTH_COLUMN] ?? "";
    const month = normalizeMonth(rawMonth);
    if (!month) throw new DateParseError(year, filePath, index + 1, rawMonth);
    const values = new Map(locations.map(location => [location, parseCell(record[location])] as const));
    return { month, values };
  });

  return { year, path: filePath, locations, rows };
}

/**
 * Build the canonical dataset for a year range.
 *
 * Years are concatenated in ascending order over the union of their location
 * columns, melted location by location into one observation per cell, and
 * stably sorted by date. Any unreadable year or bad month aborts the whole
 * load; no partial dataset is returned.
 */
export function loadDataset(options: SourceOptions): Dataset {
  const { start, end } = options.years;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start > end) {
    throw new RangeError(`Invalid year range ${start}-${end}`);
  }

  const tables: YearTable[] = [];
  for (let year = start; year <= end; year++) {
    tables.push(readYearTable(year, sourcePath(options, year)));
  }

  const locations: string[] = [];
  const seen = new Set<string>();
  for (const table of tables) {
    for (const location of table.locations) {
      if (!seen.has(location)) {
        seen.add(location);
        locations.push(location);
      }
    }
  }

  const observations: Observation[] = [];
  for (const location of locations) {
    for (const table of tables) {
      for (const row of table.rows) {
        observations.push(Object.freeze({
          location,
          month: row.month,
          year: table.year,
          aqi: row.values.get(location) ?? null,
          date: monthDate(table.year, row.month),
        }));
      }
    }
  }

  // Array.prototype.sort is stable, so same-date rows keep location order.
  observations.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  return Object.freeze({
    years: Object.freeze({ start, end }),
    locations: Object.freeze(locations),
    observations: Object.freeze(observations),
  });
}
