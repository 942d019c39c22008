import { AlreadyExistsError, NotFoundError } from '../../errors/storage-error.js';
import type { Updater } from '../interfaces/index.js';

/**
 * Keyed rows of one entity type. Values are copied on the way in and out
 * so callers never share references with the store.
 */
export class MemoryTable<T> {
  private readonly rows = new Map<string, T>();

  constructor(private readonly entity: string) {}

  create(key: string, value: T): void {
    if (this.rows.has(key)) {
      throw new AlreadyExistsError(this.entity, key);
    }
    this.rows.set(key, structuredClone(value));
  }

  get(key: string): T {
    const row = this.rows.get(key);
    if (row === undefined) {
      throw new NotFoundError(this.entity, key);
    }
    return structuredClone(row);
  }

  list(): T[] {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }

  /**
   * Synchronous read-modify-write; nothing else runs between the read and
   * the write
   */
  update(key: string, updater: Updater<T>): T {
    const row = this.rows.get(key);
    if (row === undefined) {
      throw new NotFoundError(this.entity, key);
    }

    const next = updater(structuredClone(row));
    this.rows.set(key, structuredClone(next));
    return structuredClone(next);
  }

  /**
   * Like update, but starts from fallback when the row is absent
   */
  upsert(key: string, fallback: T, updater: Updater<T>): T {
    const row = this.rows.get(key) ?? fallback;
    const next = updater(structuredClone(row));
    this.rows.set(key, structuredClone(next));
    return structuredClone(next);
  }

  delete(key: string): void {
    if (!this.rows.delete(key)) {
      throw new NotFoundError(this.entity, key);
    }
  }

  /**
   * Remove every row matching the predicate, returning how many went
   */
  deleteWhere(predicate: (row: T) => boolean): number {
    let deleted = 0;
    for (const [key, row] of this.rows) {
      if (predicate(row)) {
        this.rows.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  clear(): void {
    this.rows.clear();
  }
}
