/**
 * Single-domain cache slot.
 *
 * Holds an ordered collection plus the time of the last successful fetch.
 * A slot has no locking of its own; CacheCoordinator only touches it inside
 * the owning domain's critical section.
 */
import type { InsertPosition, SlotState } from './types.js';

export interface SlotRead<T> {
  items: T[];
  /** Infinity when the slot has never been fetched */
  ageMs: number;
}

export interface SlotWindows {
  freshWindowMs: number;
  backgroundThresholdMs: number;
}

export class CacheSlot<T> {
  private items: T[] = [];
  /** null = never fetched (or invalidated since) */
  private lastFetchTime: number | null = null;

  constructor(private readonly keyOf?: (item: T) => string) {}

  read(now: number): SlotRead<T> {
    return { items: [...this.items], ageMs: this.ageAt(now) };
  }

  ageAt(now: number): number {
    return this.lastFetchTime === null ? Infinity : now - this.lastFetchTime;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get fetchedAt(): number | null {
    return this.lastFetchTime;
  }

  /**
   * Replace the collection with a fetch result.
   */
  write(items: readonly T[], now: number): void {
    this.items = [...items];
    this.lastFetchTime = now;
  }

  invalidate(): void {
    this.items = [];
    this.lastFetchTime = null;
  }

  insertOptimistic(item: T, position: InsertPosition = 'end'): void {
    if (position === 'start') {
      this.items.unshift(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Replace the first item sharing `item`'s key. Returns false if none did.
   */
  updateOptimistic(item: T): boolean {
    const keyOf = this.requireKey();
    const key = keyOf(item);
    const index = this.items.findIndex((existing) => keyOf(existing) === key);
    if (index === -1) {
      return false;
    }
    this.items[index] = item;
    return true;
  }

  /**
   * Remove every item with the given key. Returns how many were removed.
   */
  removeOptimistic(key: string): number {
    const keyOf = this.requireKey();
    const before = this.items.length;
    this.items = this.items.filter((existing) => keyOf(existing) !== key);
    return before - this.items.length;
  }

  state(now: number, windows: SlotWindows): SlotState {
    if (this.lastFetchTime === null) {
      return 'empty';
    }
    const age = this.ageAt(now);
    if (age >= windows.freshWindowMs) {
      return 'expired';
    }
    return age >= windows.backgroundThresholdMs ? 'stale-servable' : 'fresh';
  }

  private requireKey(): (item: T) => string {
    if (!this.keyOf) {
      throw new TypeError('This slot has no identity key; keyed mutations are not supported');
    }
    return this.keyOf;
  }
}
