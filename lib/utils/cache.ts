type Entry<T> = { value: T; expiresAt: number };

export class TtlCache<T> {
  private store = new Map<string, Entry<T>>();
  constructor(private ttlMs: number, private now: () => number = Date.now) {}
  get(key: string): T | undefined {
    const e = this.store.get(key);
    if (!e) return undefined;
    if (this.now() > e.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return e.value;
  }
  set(key: string, value: T) {
    if (this.ttlMs <= 0) return;
    const now = this.now();
    this.prune(now);
    this.store.set(key, { value, expiresAt: now + this.ttlMs });
  }
  // Expired keys that are never read again would otherwise stay forever.
  private prune(now: number) {
    for (const [key, e] of this.store) {
      if (now > e.expiresAt) this.store.delete(key);
    }
  }
  clear() {
    this.store.clear();
  }
  get size(): number {
    return this.store.size;
  }
}
