export const QUESTIONS_PER_PAGE = 10;

/**
 * Page number from a query-string value. A repeated `?page=2&page=3` uses the
 * first value; anything that is not a plain integer means page 1.
 */
export function parsePage(value: unknown): number {
  if (Array.isArray(value)) return parsePage(value[0]);
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return 1;
}

/** Slice of `items` for a 1-based page; out-of-range pages are empty. */
export function paginate<T>(items: readonly T[], page: number): T[] {
  if (page < 1) return [];
  const start = (page - 1) * QUESTIONS_PER_PAGE;
  return items.slice(start, start + QUESTIONS_PER_PAGE);
}
