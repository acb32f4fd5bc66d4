/**
 * Offset pagination over collection endpoints
 */

export const PAGE_LIMIT = 500;

export interface PageShape {
  /** Items carried by this page */
  count: number;
  /** Declared total, when the endpoint reports one */
  total?: number;
}

/**
 * Lazily yield pages until the running offset reaches the declared total
 * or a page comes back empty. The first page is always yielded so callers
 * keep the collection's own metadata.
 */
export async function* paginate<P>(
  fetchPage: (offset: number, limit: number) => Promise<P>,
  shape: (page: P) => PageShape,
  limit = PAGE_LIMIT
): AsyncGenerator<P, void, undefined> {
  let offset = 0;

  while (true) {
    const page = await fetchPage(offset, limit);
    const { count, total } = shape(page);

    yield page;

    if (count === 0) {
      return;
    }

    offset += count;

    if (total !== undefined && offset >= total) {
      return;
    }
  }
}
