/**
 * Pagination
 *
 * Converts an item count and a page size into page counts and page
 * boundaries. Pages are zero-indexed; bounds are half-open `[start, end)`.
 */

export interface PageBounds {
  /** First global index on the page */
  start: number;
  /** One past the last global index on the page */
  end: number;
}

export const EMPTY_BOUNDS: PageBounds = { start: 0, end: 0 };

/**
 * Number of pages needed for `itemCount` items. An empty list still has one page.
 */
export function calculateTotalPages(itemCount: number, pageSize: number): number {
  if (itemCount <= 0 || pageSize <= 0) {
    return 1;
  }
  return Math.ceil(itemCount / pageSize);
}

/**
 * Global index range covered by `page`.
 *
 * @example
 * calculatePageBounds(2, 2, 5) // { start: 4, end: 5 }
 */
export function calculatePageBounds(page: number, pageSize: number, itemCount: number): PageBounds {
  const start = Math.max(0, page) * pageSize;
  const end = Math.min(start + pageSize, itemCount);
  return end > start ? { start, end } : { start, end: start };
}

/**
 * Number of entries on the page described by `bounds`.
 */
export function pageLength(bounds: PageBounds): number {
  return bounds.end - bounds.start;
}
