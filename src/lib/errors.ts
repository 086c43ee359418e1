/** Base class for every failure raised while loading or querying AQI data. */
export class AqiDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A year's source file could not be read, or is not a table with a `Month` column. */
export class MissingSourceError extends AqiDataError {
  constructor(
    readonly year: number,
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Missing source for ${year} (${path}): ${reason}`, { cause });
  }
}

/**
 * A `Month` cell is not one of the twelve three-letter abbreviations.
 * `row` is the 1-based data row, not counting the header or blank lines.
 */
export class DateParseError extends AqiDataError {
  constructor(
    readonly year: number,
    readonly path: string,
    readonly row: number,
    readonly month: string,
  ) {
    super(`Unrecognised month "${month}" in ${path} (year ${year}, data row ${row}, blank lines excluded)`);
  }
}

export class InvalidCategoryError extends AqiDataError {
  constructor(
    readonly category: string,
    readonly validCategories: readonly string[],
  ) {
    super(`Unknown AQI category "${category}". Valid categories: ${validCategories.join(', ')}`);
  }
}

export class InvalidConfigError extends AqiDataError {}
