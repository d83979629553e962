/**
 * Search filter
 * Pure derivation of the visible items of one navigation level.
 */

export interface Searchable {
  readonly name: string;
  readonly description: string;
}

/**
 * Items whose name or description contains the query, case-insensitively,
 * in their original order. An empty query keeps everything.
 */
export function filterItems<T extends Searchable>(
  items: ReadonlyArray<T>,
  query: string,
): T[] {
  if (query.length === 0) {
    return [...items];
  }

  const needle = query.toLowerCase();
  return items.filter(
    (item) =>
      item.name.toLowerCase().includes(needle) ||
      item.description.toLowerCase().includes(needle),
  );
}

/**
 * Keep a selection index inside a list of `length` items:
 * undefined for an empty list, 0 when the index falls outside it.
 */
export function clampSelection(
  index: number | undefined,
  length: number,
): number | undefined {
  if (length === 0) return undefined;
  if (index === undefined || index < 0 || index >= length) return 0;
  return index;
}
