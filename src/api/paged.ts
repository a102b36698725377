/**
 * Paged collection support
 *
 * CVE Services splits long collections into pages. Each page carries its
 * items under a resource-named key and a `nextPage` number; on the last
 * page `nextPage` is null, and single-page responses leave it out. Any
 * other value is sent back as the `page` parameter.
 */

import { CveApiResponseError } from '../errors.js';
import type { PagedResponse, QueryParams } from './types.js';

export type PageFetcher<T> = (params: QueryParams) => Promise<PagedResponse<T>>;

/**
 * Lazily walk every page, yielding items as each page arrives. Pages are
 * only requested when the consumer asks for more items, so stopping early
 * leaves the remaining pages unfetched. The params object is not modified.
 */
export async function* paginate<T>(
  fetchPage: PageFetcher<T>,
  params: QueryParams,
  itemsKey: string
): AsyncGenerator<T, void, undefined> {
  let pageParams: QueryParams = { ...params };

  while (true) {
    const page = await fetchPage(pageParams);

    const items = page[itemsKey];
    if (!Array.isArray(items)) {
      throw new CveApiResponseError(`Paged response is missing the "${itemsKey}" list`);
    }
    yield* items;

    const nextPage = page.nextPage;
    if (nextPage === null || nextPage === undefined) {
      return;
    }
    if (Array.isArray(nextPage)) {
      throw new CveApiResponseError('Paged response has a "nextPage" that is neither a page number nor a token');
    }
    pageParams = { ...pageParams, page: nextPage };
  }
}

/**
 * Drain a paged sequence into an array
 */
export async function collectAll<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}
