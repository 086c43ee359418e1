import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { classifyByCategory } from "../src/lib/categories";
import { DateParseError, MissingSourceError } from "../src/lib/errors";
import { MONTHS } from "../src/lib/months";
import { loadDataset, parseCell, sourcePath, type SourceOptions } from "./loader";

let dataDir: string;

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "aqi-loader-"));
});

afterEach(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

function writeYear(year: number, csv: string) {
  fs.writeFileSync(path.join(dataDir, `aqi_${year}.csv`), csv);
}

/** A full year: one row per month, `value(location, monthIndex)` per cell. */
function fullYear(locations: string[], value: (location: string, month: number) => number | "") {
  const lines = [["Month", ...locations].join(",")];
  MONTHS.forEach((month, m) => lines.push([month, ...locations.map(l => String(value(l, m)))].join(",")));
  return lines.join("\n") + "\n";
}

function options(start: number, end: number): SourceOptions {
  return { years: { start, end }, dataDir, filePattern: "aqi_{year}.csv" };
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a failure");
}

describe("sourcePath", () => {
  it("substitutes the year into the pattern", () => {
    const opts: SourceOptions = { years: { start: 2016, end: 2016 }, dataDir: "data", filePattern: "hyd_{year}.csv" };
    expect(sourcePath(opts, 2019)).toBe(path.join("data", "hyd_2019.csv"));
  });
});

describe("parseCell", () => {
  it("reads numbers and treats blanks and junk as absent", () => {
    expect(parseCell(" 42 ")).toBe(42);
    expect(parseCell("7.5")).toBe(7.5);
    expect(parseCell("")).toBeNull();
    expect(parseCell(undefined)).toBeNull();
    expect(parseCell("n/a")).toBeNull();
  });
});

describe("loadDataset", () => {
  it("melts a single year and classifies it", () => {
    writeYear(2016, "Month,A\nJan,40\nFeb,120\n");
    const dataset = loadDataset(options(2016, 2016));

    expect(dataset.observations).toEqual([
      { location: "A", month: "Jan", year: 2016, aqi: 40, date: "2016-01-01" },
      { location: "A", month: "Feb", year: 2016, aqi: 120, date: "2016-02-01" },
    ]);
    expect(classifyByCategory(dataset, "GOOD").observations).toEqual([
      { location: "A", month: "Jan", year: 2016, aqi: 40, date: "2016-01-01" },
    ]);
    expect(classifyByCategory(dataset, "MODERATE").observations).toEqual([
      { location: "A", month: "Feb", year: 2016, aqi: 120, date: "2016-02-01" },
    ]);
  });

  it("has twelve observations per year for every location in the union", () => {
    writeYear(2016, fullYear(["A", "B"], (l, m) => (l === "A" ? 10 + m : 100 + m)));
    writeYear(2017, fullYear(["B", "C"], (l, m) => (l === "B" ? 200 + m : 300 + m)));
    const dataset = loadDataset(options(2016, 2017));

    expect(dataset.locations).toEqual(["A", "B", "C"]);
    expect(dataset.observations).toHaveLength(3 * 2 * 12);
    for (const year of [2016, 2017]) {
      for (const location of ["A", "B", "C"]) {
        const rows = dataset.observations.filter(o => o.year === year && o.location === location);
        expect(rows.map(o => o.month)).toEqual([...MONTHS]);
      }
    }
  });

  it("fills locations missing from a year with absent readings", () => {
    writeYear(2016, fullYear(["A", "B"], () => 50));
    writeYear(2017, fullYear(["B", "C"], () => 60));
    const dataset = loadDataset(options(2016, 2017));

    const a2017 = dataset.observations.filter(o => o.location === "A" && o.year === 2017);
    const c2016 = dataset.observations.filter(o => o.location === "C" && o.year === 2016);
    expect(a2017.every(o => o.aqi === null)).toBe(true);
    expect(c2016.every(o => o.aqi === null)).toBe(true);
    expect(dataset.observations.filter(o => o.location === "B").every(o => o.aqi !== null)).toBe(true);
  });

  it("sorts by date and keeps location order within a date", () => {
    writeYear(2016, fullYear(["A", "B"], () => 50));
    writeYear(2017, fullYear(["B", "C"], () => 60));
    const { observations } = loadDataset(options(2016, 2017));

    for (let i = 1; i < observations.length; i++) {
      expect(observations[i - 1].date <= observations[i].date).toBe(true);
    }
    expect(observations.slice(0, 3).map(o => [o.location, o.date])).toEqual([
      ["A", "2016-01-01"],
      ["B", "2016-01-01"],
      ["C", "2016-01-01"],
    ]);
  });

  it("produces an identical dataset on every run", () => {
    writeYear(2016, fullYear(["A", "B"], (l, m) => (m % 3 === 0 ? "" : m * 10)));
    writeYear(2017, fullYear(["B"], (_l, m) => 400 - m));
    expect(loadDataset(options(2016, 2017))).toEqual(loadDataset(options(2016, 2017)));
  });

  it("freezes the result", () => {
    writeYear(2016, "Month,A\nJan,40\n");
    const dataset = loadDataset(options(2016, 2016));
    expect(Object.isFrozen(dataset.observations)).toBe(true);
    expect(Object.isFrozen(dataset.observations[0])).toBe(true);
  });

  it("keeps blank and non-numeric cells as absent readings", () => {
    writeYear(2016, "Month,A\nJan,\nFeb,n/a\nMar, 42 \n");
    const dataset = loadDataset(options(2016, 2016));
    expect(dataset.observations.map(o => o.aqi)).toEqual([null, null, 42]);
  });

  it("normalises month spelling and ignores a Year column in the source", () => {
    writeYear(2016, "Month,Year,A\nJAN,1999,40\n");
    const dataset = loadDataset(options(2016, 2016));
    expect(dataset.locations).toEqual(["A"]);
    expect(dataset.observations).toEqual([{ location: "A", month: "Jan", year: 2016, aqi: 40, date: "2016-01-01" }]);
  });

  it("aborts on an unrecognised month", () => {
    writeYear(2016, "Month,A\nJan,40\nJann,50\n");
    const err = caught(() => loadDataset(options(2016, 2016)));

    expect(err).toBeInstanceOf(DateParseError);
    if (err instanceof DateParseError) {
      expect(err.month).toBe("Jann");
      expect(err.row).toBe(2);
      expect(err.year).toBe(2016);
      expect(err.path).toBe(path.join(dataDir, "aqi_2016.csv"));
    }
  });

  it("aborts when a year's file is missing", () => {
    writeYear(2016, "Month,A\nJan,40\n");
    const err = caught(() => loadDataset(options(2016, 2017)));

    expect(err).toBeInstanceOf(MissingSourceError);
    if (err instanceof MissingSourceError) {
      expect(err.year).toBe(2017);
      expect(err.message).toContain(path.join(dataDir, "aqi_2017.csv"));
    }
  });

  it("counts data rows without blank lines when reporting a bad month", () => {
    writeYear(2016, "Month,A\n\nJan,40\n\nJann,50\n");
    const err = caught(() => loadDataset(options(2016, 2016)));

    expect(err).toBeInstanceOf(DateParseError);
    if (err instanceof DateParseError) {
      expect(err.row).toBe(2);
      expect(err.message).toBe(
        `Unrecognised month "Jann" in ${path.join(dataDir, "aqi_2016.csv")} (year 2016, data row 2, blank lines excluded)`,
      );
    }
  });

  it("rejects a table without a Month column", () => {
    writeYear(2016, "Date,A\nJan,40\n");
    const err = caught(() => loadDataset(options(2016, 2016)));
    expect(err).toBeInstanceOf(MissingSourceError);
    if (err instanceof Error) {
      expect(err.message).toBe(`Missing source for 2016 (${path.join(dataDir, "aqi_2016.csv")}): no "Month" column`);
    }
  });

  it("rejects an inverted year range", () => {
    expect(() => loadDataset(options(2018, 2016))).toThrow(RangeError);
  });
});
