import { OnsetDetectorError } from "./errors.ts";

export type FrameView = Pick<
  Frame,
  "chunkSize" | "windowChunks" | "length" | "buffer" | "energy" | "toString"
>;

/**
 * Sliding window of `windowChunks` chunks held as one contiguous buffer,
 * oldest chunk first.
 */
export class Frame {
  readonly chunkSize: number;
  readonly windowChunks: number;

  private readonly samples: Float32Array;
  private cachedEnergy: number | null = 0;

  constructor(chunkSize: number, windowChunks: number) {
    for (const [name, value] of [
      ["chunkSize", chunkSize],
      ["windowChunks", windowChunks],
    ] as const) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new OnsetDetectorError(
          `Frame ${name} must be a positive integer, got ${value}`,
          "invalid_config"
        );
      }
    }
    this.chunkSize = chunkSize;
    this.windowChunks = windowChunks;
    this.samples = new Float32Array(chunkSize * windowChunks);
  }

  get length(): number {
    return this.samples.length;
  }

  /**
   * Appends `chunk` as the newest chunk and returns the evicted oldest one.
   * Pass `evicted` to receive it without allocating.
   */
  write(chunk: ArrayLike<number>, evicted?: Float32Array): Float32Array {
    if (chunk.length !== this.chunkSize) {
      throw new OnsetDetectorError(
        `Expected a chunk of ${this.chunkSize} samples, got ${chunk.length}`,
        "chunk_size_mismatch"
      );
    }
    if (evicted && evicted.length !== this.chunkSize) {
      throw new OnsetDetectorError(
        `Eviction buffer must hold ${this.chunkSize} samples, got ${evicted.length}`,
        "chunk_size_mismatch"
      );
    }

    const out = evicted ?? new Float32Array(this.chunkSize);
    out.set(this.samples.subarray(0, this.chunkSize));
    this.samples.copyWithin(0, this.chunkSize);
    const tail = this.samples.length - this.chunkSize;
    for (let i = 0; i < this.chunkSize; i += 1) {
      this.samples[tail + i] = chunk[i];
    }
    this.cachedEnergy = null;
    return out;
  }

  buffer(): Float32Array {
    return this.samples.slice();
  }

  energy(): number {
    if (this.cachedEnergy === null) {
      let e = 0;
      for (let i = 0; i < this.samples.length; i += 1) {
        const s = this.samples[i];
        e += s * s;
      }
      this.cachedEnergy = e;
    }
    return this.cachedEnergy;
  }

  clear(): void {
    this.samples.fill(0);
    this.cachedEnergy = 0;
  }

  toString(): string {
    const head = Array.from(this.samples.subarray(0, 4));
    return `[${head.join(",")}...]`;
  }
}
