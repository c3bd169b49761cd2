import type { Store } from '../store';

/**
 * Map-backed Store<T> for tests. Values go in and come out as structured
 * clones, so a caller mutating a snapshot never changes what is stored.
 */
export class MemoryStore<T> implements Store<T> {
  private readonly entries = new Map<string, T>();

  async get(id: string): Promise<T | null> {
    const value = this.entries.get(id);
    return value === undefined ? null : structuredClone(value);
  }

  async put(id: string, value: T): Promise<void> {
    this.entries.set(id, structuredClone(value));
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async list(): Promise<string[]> {
    return Array.from(this.entries.keys());
  }

  async exists(id: string): Promise<boolean> {
    return this.entries.has(id);
  }

  /** Number of stored ids */
  size(): number {
    return this.entries.size;
  }
}
