import { CrossChainError } from "./errors";

type Undo = () => void;

/**
 * Undo log with nested checkpoints.
 *
 * Writes made outside any checkpoint (genesis funding, provisioning in
 * tests) are permanent. Inside a checkpoint every write registers its
 * inverse, so `revert` restores the exact pre-checkpoint state.
 */
export class Journal {
  private undos: Undo[] = [];
  private marks: number[] = [];

  get depth(): number {
    return this.marks.length;
  }

  record(undo: Undo): void {
    if (this.marks.length > 0) this.undos.push(undo);
  }

  checkpoint(): void {
    this.marks.push(this.undos.length);
  }

  commit(): void {
    if (this.marks.pop() === undefined)
      throw new CrossChainError("InvalidArgument", "commit without checkpoint");
    if (this.marks.length === 0) this.undos = [];
  }

  revert(): void {
    const mark = this.marks.pop();
    if (mark === undefined)
      throw new CrossChainError("InvalidArgument", "revert without checkpoint");
    while (this.undos.length > mark) this.undos.pop()?.();
  }

  /** Runs `fn` atomically: all of its writes are kept or none are. */
  run<T>(fn: () => T): T {
    this.checkpoint();
    let out: T;
    try {
      out = fn();
    } catch (e) {
      this.revert();
      throw e;
    }
    this.commit();
    return out;
  }
}

/* ── journaled containers ────────────────────────────────── */

export class JournaledMap<K, V extends {}> {
  private readonly inner = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get size(): number {
    return this.inner.size;
  }

  get(key: K): V | undefined {
    return this.inner.get(key);
  }

  has(key: K): boolean {
    return this.inner.has(key);
  }

  keys(): IterableIterator<K> {
    return this.inner.keys();
  }

  entries(): IterableIterator<[K, V]> {
    return this.inner.entries();
  }

  set(key: K, value: V): void {
    this.remember(key);
    this.inner.set(key, value);
  }

  delete(key: K): boolean {
    if (!this.inner.has(key)) return false;
    this.remember(key);
    return this.inner.delete(key);
  }

  private remember(key: K): void {
    const prev = this.inner.get(key);
    this.journal.record(() => {
      if (prev === undefined) this.inner.delete(key);
      else this.inner.set(key, prev);
    });
  }
}

export class JournaledLog<T> {
  private readonly items: T[] = [];

  constructor(private readonly journal: Journal) {}

  get length(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    this.journal.record(() => {
      this.items.pop();
    });
  }

  toArray(): readonly T[] {
    return [...this.items];
  }
}

export class JournaledCell<T> {
  constructor(
    private readonly journal: Journal,
    private value: T,
  ) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    const prev = this.value;
    this.journal.record(() => {
      this.value = prev;
    });
    this.value = next;
  }
}
