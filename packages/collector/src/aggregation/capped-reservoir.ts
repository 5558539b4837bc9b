/**
 * Append-only sample collection with a hard capacity.
 * Once full, further samples are dropped; existing samples are never replaced.
 */
export class CappedReservoir<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("CappedReservoir capacity must be a positive integer.");
    }
  }

  get length(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Returns false when the sample was dropped because the reservoir is full.
   */
  append(value: T): boolean {
    if (this.isFull) {
      return false;
    }
    this.items.push(value);
    return true;
  }

  values(): readonly T[] {
    return this.items;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
