/**
 * Undo log behind every ledger entry point.
 *
 * Each write to a journaled cell or map records its inverse while an
 * `atomic` scope is open. A scope that throws replays the inverses recorded
 * since it was opened and rethrows. Scopes nest: an inner failure caught by
 * the outer scope reverts only the inner writes. Commit hooks fire once the
 * outermost scope returns.
 */
export class Journal {
  private undo: (() => void)[] = [];
  private depth = 0;
  private readonly commitHooks: (() => void)[] = [];

  get inScope(): boolean {
    return this.depth > 0;
  }

  record(inverse: () => void): void {
    if (this.depth > 0) this.undo.push(inverse);
  }

  onCommit(hook: () => void): void {
    this.commitHooks.push(hook);
  }

  atomic<T>(fn: () => T): T {
    const mark = this.undo.length;
    this.depth++;
    let out: T;
    try {
      out = fn();
    } catch (err) {
      while (this.undo.length > mark) this.undo.pop()?.();
      this.leave();
      throw err;
    }
    this.leave();
    if (this.depth === 0) for (const hook of this.commitHooks) hook();
    return out;
  }

  private leave(): void {
    this.depth--;
    if (this.depth === 0) this.undo = [];
  }
}

export class Cell<T> {
  constructor(
    private readonly journal: Journal,
    private value: T,
  ) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    const prev = this.value;
    if (Object.is(prev, next)) return;
    this.journal.record(() => {
      this.value = prev;
    });
    this.value = next;
  }
}

/** Map with a default value; writing the default removes the entry. */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(
    private readonly journal: Journal,
    private readonly fallback: V,
  ) {}

  get(key: K): V {
    return this.entries.has(key) ? (this.entries.get(key) ?? this.fallback) : this.fallback;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    const had = this.entries.has(key);
    const prev = this.entries.get(key);
    if (had ? Object.is(prev, value) : Object.is(value, this.fallback)) return;
    this.journal.record(() => {
      if (had && prev !== undefined) this.entries.set(key, prev);
      else this.entries.delete(key);
    });
    if (Object.is(value, this.fallback)) this.entries.delete(key);
    else this.entries.set(key, value);
  }

  delete(key: K): void {
    this.set(key, this.fallback);
  }

  get size(): number {
    return this.entries.size;
  }
}
