import type { Page } from "./typings";

export type Collections = ReadonlyMap<string, readonly Page[]>;

/** Newest first. Pages with the same date are ordered by id. */
export function byTime(a: Page, b: Page): number {
  return b.date.getTime() - a.date.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Groups non-draft pages by directory. Only call this once every page in the
 * tree is rendered: any layout may read any directory's collection.
 */
export function collect(pages: Iterable<Page>): Collections {
  const dirs = new Map<string, Page[]>();
  for (const page of pages) {
    if (page.draft) continue;
    const list = dirs.get(page.dir);
    if (list) {
      list.push(page);
    } else {
      dirs.set(page.dir, [page]);
    }
  }

  const collections = new Map<string, readonly Page[]>();
  for (const [dir, list] of [...dirs].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    collections.set(dir, Object.freeze(list.sort(byTime)));
  }
  return collections;
}

/** The collections as a plain object, the `all` of templates. */
export function toRecord(collections: Collections): Readonly<Record<string, readonly Page[]>> {
  return Object.freeze(Object.fromEntries(collections));
}
