/**
 * Ordered observer list used for tween and sequence notifications.
 */

/** A registered observer. */
export type Listener<TArgs extends readonly unknown[]> = (...args: TArgs) => void;

/**
 * Observers invoked in registration order.
 *
 * `emit()` works on a snapshot: listeners added while an emission is in
 * progress first run on the next emission.
 */
export class ListenerList<TArgs extends readonly unknown[]> {
  private readonly listeners: Listener<TArgs>[] = [];

  add(listener: Listener<TArgs>): void {
    this.listeners.push(listener);
  }

  /** Remove one registration of `listener`. Returns false if it was not registered. */
  remove(listener: Listener<TArgs>): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) {
      return false;
    }
    this.listeners.splice(index, 1);
    return true;
  }

  emit(...args: TArgs): void {
    for (const listener of [...this.listeners]) {
      listener(...args);
    }
  }

  clear(): void {
    this.listeners.length = 0;
  }

  get size(): number {
    return this.listeners.length;
  }
}
