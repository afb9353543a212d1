import type { CursorPage } from "./types.js";

/**
 * Follow continuation cursors until a page arrives without one. Items are
 * yielded in page order; an empty page that still carries a cursor is
 * followed rather than treated as the end.
 */
export async function* walkCursorPages<T>(
  fetchFirst: () => Promise<CursorPage<T>>,
  fetchNext: (cursor: string) => Promise<CursorPage<T>>,
): AsyncGenerator<T> {
  let page = await fetchFirst();

  for (;;) {
    yield* page.items;
    if (!page.next) return;
    page = await fetchNext(page.next);
  }
}

/** Request page 1, 2, … and stop at the first page with no items. */
export async function* walkNumberedPages<T>(
  fetchPage: (page: number) => Promise<T[]>,
  opts: { startPage?: number } = {},
): AsyncGenerator<T> {
  for (let page = opts.startPage ?? 1; ; page++) {
    const items = await fetchPage(page);
    if (items.length === 0) return;
    yield* items;
  }
}

export async function collect<T>(
  source: AsyncIterable<T> | Iterable<T>,
): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
