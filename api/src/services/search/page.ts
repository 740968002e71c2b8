import type { Page, PageRequest } from "./types";

/**
 * Page with no content and a total of zero.
 */
export function emptyPage<T>(): Page<T> {
  return { content: [], totalElements: 0, offset: 0, size: 0 };
}

export function createPage<T>(
  content: T[],
  totalElements: number,
  page: PageRequest
): Page<T> {
  return { content, totalElements, offset: page.offset, size: page.size };
}

/**
 * Whether more results exist after this page.
 */
export function hasNextPage<T>(page: Page<T>): boolean {
  return page.offset + page.content.length < page.totalElements;
}
