/**
 * Content keys this sink has confirmed in the store. Owned by a single
 * sink instance; starts empty and only grows.
 */
export class SeenCache {
  private keys: Set<string> = new Set();

  has(key: string): boolean {
    return this.keys.has(key);
  }

  add(key: string): void {
    this.keys.add(key);
  }

  get size(): number {
    return this.keys.size;
  }
}
