/**
 * Repository ports. Any backing store (the in-memory maps, or a real
 * database) must honour the same contract:
 *
 * - `save` is an upsert, last writer wins.
 * - Lookups resolve to `null` when nothing matches; absence is not an error.
 * - `scan` filters first and paginates the matches afterwards.
 * - Entities cross the boundary as independent copies in both directions.
 */

export interface Page {
  limit: number;
  offset: number;
}

export type Predicate<T> = (entity: T) => boolean;

export interface KeyedStore<T extends { readonly id: string }> {
  save(entity: T): Promise<void>;
  findById(id: string): Promise<T | null>;
  scan(predicate: Predicate<T>, page: Page): Promise<T[]>;
  /** Rejects with NotFoundError when the id is absent. */
  delete(id: string): Promise<void>;
  exists(id: string): Promise<boolean>;
  count(): Promise<number>;
  countWhere(predicate: Predicate<T>): Promise<number>;
}

/**
 * Applies `page` to an already filtered list.
 */
export function paginate<T>(items: readonly T[], page: Page): T[] {
  const offset = Math.max(0, page.offset);
  if (page.limit <= 0 || offset >= items.length) {
    return [];
  }
  return items.slice(offset, offset + page.limit);
}

export const everything: Page = { limit: Number.POSITIVE_INFINITY, offset: 0 };
