import path from "node:path";

/**
 * Memoizes expensive per-repository work by resolved path. Holds at most
 * `capacity` entries and evicts the one populated longest ago. Failures are
 * cached too, so a path is attempted at most once while it stays cached.
 */
export class ScanCache<T> {
  private readonly entries = new Map<string, Promise<T>>();
  private readonly capacity: number;
  private loads = 0;

  constructor(capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Scan cache capacity must be a positive integer: ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Number of times a loader actually ran. */
  get loadCount(): number {
    return this.loads;
  }

  has(repoPath: string): boolean {
    return this.entries.has(path.resolve(repoPath));
  }

  async getOrLoad(
    repoPath: string,
    loader: (resolvedPath: string) => Promise<T>,
  ): Promise<T> {
    const key = path.resolve(repoPath);
    const cached = this.entries.get(key);
    if (cached) {
      return await cached;
    }

    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.loads += 1;
    const pending = loader(key);
    this.entries.set(key, pending);
    return await pending;
  }
}
