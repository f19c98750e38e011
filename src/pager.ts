import type { Page } from "./types";

export type PageFetcher<T> = (offset: number, limit: number, signal?: AbortSignal) => Promise<Page<T>>;

export interface PagerOptions {
  limit: number;
  signal?: AbortSignal;
  onPage?: (progress: { offset: number; received: number; collected: number; total: number }) => void;
}

// Ends on the first empty page. `total` is only reported, never trusted: the collection can change mid-walk.
export async function* pages<T>(fetchPage: PageFetcher<T>, options: PagerOptions): AsyncGenerator<T[], void, undefined> {
  if (!Number.isInteger(options.limit) || options.limit < 1) {
    throw new RangeError(`Page limit must be a positive integer, got ${options.limit}`);
  }

  let offset = 0;
  let collected = 0;

  while (true) {
    options.signal?.throwIfAborted();

    const page = await fetchPage(offset, options.limit, options.signal);
    const span = page.span ?? page.items.length;
    if (span === 0) {
      return;
    }

    collected += page.items.length;
    options.onPage?.({ offset, received: page.items.length, collected, total: page.total });

    yield page.items;
    offset += span;
  }
}

export async function collectAll<T>(fetchPage: PageFetcher<T>, options: PagerOptions): Promise<T[]> {
  const results: T[] = [];

  for await (const items of pages(fetchPage, options)) {
    results.push(...items);
  }

  return results;
}
