import { paginate, type KeyedStore, type Page, type Predicate } from '../../domain/repository.js';
import { NotFoundError } from '../../application/errors.js';
import { ReadWriteLock } from '../../application/lock.js';

/**
 * Map-backed store guarded by a reader/writer lock. Entities are cloned on
 * the way in and on the way out, so nothing outside can alias the stored
 * copy. Scans visit entities in insertion order.
 */
export class InMemoryKeyedStore<T extends { readonly id: string }> implements KeyedStore<T> {
  protected readonly entities = new Map<string, T>();
  protected readonly lock = new ReadWriteLock();

  constructor(private readonly kind: string) {}

  save(entity: T): Promise<void> {
    return this.lock.write(() => {
      this.entities.set(entity.id, structuredClone(entity));
    });
  }

  findById(id: string): Promise<T | null> {
    return this.lock.read(() => {
      const entity = this.entities.get(id);
      return entity ? structuredClone(entity) : null;
    });
  }

  scan(predicate: Predicate<T>, page: Page): Promise<T[]> {
    return this.lock.read(() => this.collect(predicate, page));
  }

  delete(id: string): Promise<void> {
    return this.lock.write(() => {
      if (!this.entities.delete(id)) {
        throw new NotFoundError(`${this.kind} not found`);
      }
    });
  }

  exists(id: string): Promise<boolean> {
    return this.lock.read(() => this.entities.has(id));
  }

  count(): Promise<number> {
    return this.lock.read(() => this.entities.size);
  }

  countWhere(predicate: Predicate<T>): Promise<number> {
    return this.lock.read(() => {
      let matched = 0;
      for (const entity of this.entities.values()) {
        if (predicate(structuredClone(entity))) {
          matched += 1;
        }
      }
      return matched;
    });
  }

  /**
   * Copy, filter, then paginate. Predicates only ever see copies. Callers
   * must hold the lock.
   */
  protected collect(predicate: Predicate<T>, page: Page): T[] {
    const copies = [...this.entities.values()].map((entity) => structuredClone(entity));
    return paginate(
      copies.filter((entity) => predicate(entity)),
      page
    );
  }
}
