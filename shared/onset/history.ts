/**
 * Fixed-capacity ring of onset detection values, indexed newest first.
 * Older values fall off once `capacity` is reached.
 */
export class OnsetHistory {
  readonly capacity: number;

  private readonly values: Float64Array;
  private head = 0;
  private size = 0;
  private pushed = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.values = new Float64Array(capacity);
  }

  /** Values currently retained (at most `capacity`). */
  get length(): number {
    return this.size;
  }

  /** Values pushed since construction or the last `clear()`. */
  get totalPushed(): number {
    return this.pushed;
  }

  push(value: number): void {
    this.head = (this.head + 1) % this.capacity;
    this.values[this.head] = value;
    if (this.size < this.capacity) this.size += 1;
    this.pushed += 1;
  }

  /** `at(0)` is the newest value. */
  at(index: number): number | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return undefined;
    }
    return this.values[(this.head - index + this.capacity) % this.capacity];
  }

  /**
   * Copies the newest `out.length` values into `out`, newest first.
   * Throws without touching `out` if fewer values are held.
   */
  copyRecent(out: Float64Array): void {
    if (out.length > this.size) {
      throw new RangeError(`Requested ${out.length} recent values, only ${this.size} held`);
    }
    for (let i = 0; i < out.length; i += 1) {
      out[i] = this.values[(this.head - i + this.capacity) % this.capacity];
    }
  }

  toArray(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.size; i += 1) {
      out.push(this.values[(this.head - i + this.capacity) % this.capacity]);
    }
    return out;
  }

  clear(): void {
    this.values.fill(0);
    this.head = 0;
    this.size = 0;
    this.pushed = 0;
  }
}
