export const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

export type Month = (typeof MONTHS)[number];

/** Canonical abbreviation for a month cell (`"jan "` → `"Jan"`), or null if unrecognised. */
export function normalizeMonth(value: string): Month | null {
  const wanted = value.trim().toLowerCase();
  return MONTHS.find(m => m.toLowerCase() === wanted) ?? null;
}

/** First day of the month as an ISO date, e.g. `monthDate(2016, 'Feb')` → `"2016-02-01"`. */
export function monthDate(year: number, month: Month): string {
  const mm = String(MONTHS.indexOf(month) + 1).padStart(2, '0');
  return `${String(year).padStart(4, '0')}-${mm}-01`;
}
