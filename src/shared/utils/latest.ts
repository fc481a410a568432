/**
 * Last-write-wins value cell.
 * Writers replace the whole snapshot; readers always get a complete one.
 */

export interface Snapshot<T> {
  value: T;
  receivedAt: number;
}

type Listener<T> = (snapshot: Snapshot<T>) => void;

export class LatestValue<T> {
  private current: Snapshot<T> | undefined;
  private listeners = new Set<Listener<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  set(value: T): void {
    const snapshot: Snapshot<T> = Object.freeze({ value, receivedAt: this.now() });
    this.current = snapshot;
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }

  get(): T | undefined {
    return this.current?.value;
  }

  snapshot(): Snapshot<T> | undefined {
    return this.current;
  }

  hasValue(): boolean {
    return this.current !== undefined;
  }

  /**
   * Listen to future writes. Returns an unsubscribe function.
   */
  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.current = undefined;
  }
}
