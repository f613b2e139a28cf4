import {
  resolveProcessorConfig,
  type ProcessorConfig,
  type ProcessorConfigInput,
} from "./config.ts";
import { OnsetDetectorError } from "./errors.ts";
import { Frame, type FrameView } from "./frame.ts";
import { OnsetHistory } from "./history.ts";
import { consoleLogger, type OnsetLogger } from "./logger.ts";
import type { OnsetFrameResult, OnsetPhase, OnsetProcessorSnapshot } from "./types.ts";
import { mean, median } from "./utils.ts";

export type OnsetFrameProcessorOptions = {
  config?: ProcessorConfigInput;
  logger?: OnsetLogger;
};

const PEAK_PICK_SPAN = 3;

/**
 * Streaming energy onset detector.
 *
 * Each chunk is shifted into a pair of staggered frames; the absolute energy
 * difference between them is the onset detection function (ODF). A peak is
 * confirmed when the previous ODF value is a strict local maximum above an
 * adaptive threshold, so `true` always refers to the chunk processed one call
 * earlier.
 */
export class OnsetFrameProcessor {
  readonly config: ProcessorConfig;

  private readonly logger: OnsetLogger;
  private readonly previous: Frame;
  private readonly current: Frame;
  private readonly history: OnsetHistory;
  private readonly carryOver: Float32Array;
  private readonly discarded: Float32Array;
  private readonly sanitized: Float32Array;
  private readonly recent: Float64Array;
  private readonly requiredHistory: number;

  private threshold: number | null = null;
  private highestPeak = 0;
  private warnedNonFinite = false;

  constructor(options: OnsetFrameProcessorOptions = {}) {
    this.config = resolveProcessorConfig(options.config ?? {});
    this.logger = options.logger ?? consoleLogger;

    if (this.config.mode === "spectral-difference") {
      throw new OnsetDetectorError(
        "Spectral-difference onset detection is not implemented; use mode \"energy\"",
        "mode_not_implemented"
      );
    }

    const { chunkSize, windowChunks, threshold } = this.config;
    this.previous = new Frame(chunkSize, windowChunks);
    this.current = new Frame(chunkSize, windowChunks);
    this.requiredHistory = Math.max(threshold.lookback, PEAK_PICK_SPAN);
    this.history = new OnsetHistory(this.requiredHistory);
    this.carryOver = new Float32Array(chunkSize);
    this.discarded = new Float32Array(chunkSize);
    this.sanitized = new Float32Array(chunkSize);
    this.recent = new Float64Array(threshold.lookback);
  }

  get currentFrame(): FrameView {
    return this.current;
  }

  get previousFrame(): FrameView {
    return this.previous;
  }

  get phase(): OnsetPhase {
    const remaining = this.requiredHistory - this.history.length;
    return remaining > 0 ? { kind: "warming-up", remaining } : { kind: "ready" };
  }

  process(chunk: ArrayLike<number>): boolean {
    return this.analyze(chunk).onset;
  }

  analyze(chunk: ArrayLike<number>): OnsetFrameResult {
    const input = this.validate(chunk);

    this.current.write(input, this.carryOver);
    this.previous.write(this.carryOver, this.discarded);

    const odf = Math.abs(this.current.energy() - this.previous.energy());
    const wasReady = this.history.length >= this.requiredHistory;
    this.history.push(odf);

    const phase = this.phase;
    if (phase.kind === "warming-up") {
      return { onset: false, odf, threshold: null, strength: null, phase };
    }
    if (!wasReady && this.config.verbose) {
      this.logger.log("detector ready", {
        chunkSize: this.config.chunkSize,
        windowChunks: this.config.windowChunks,
        lookback: this.config.threshold.lookback,
        processedChunks: this.history.totalPushed,
      });
    }

    const threshold = this.computeThreshold();
    const strength = this.pickPeak(threshold);
    return { onset: strength !== null, odf, threshold, strength, phase };
  }

  snapshot(): OnsetProcessorSnapshot {
    return {
      phase: this.phase,
      threshold: this.threshold,
      highestPeak: this.highestPeak,
      processedChunks: this.history.totalPushed,
      history: this.history.toArray(),
    };
  }

  reset(): void {
    this.previous.clear();
    this.current.clear();
    this.history.clear();
    this.threshold = null;
    this.highestPeak = 0;
    this.warnedNonFinite = false;
  }

  private validate(chunk: ArrayLike<number>): ArrayLike<number> {
    const { chunkSize, nonFiniteSamples } = this.config;
    if (chunk.length !== chunkSize) {
      throw new OnsetDetectorError(
        `Expected a chunk of ${chunkSize} samples, got ${chunk.length}`,
        "chunk_size_mismatch"
      );
    }

    // Frames hold float32, so anything past its range is as bad as Infinity.
    let firstBad = -1;
    for (let i = 0; i < chunkSize; i += 1) {
      if (!Number.isFinite(Math.fround(chunk[i]))) {
        firstBad = i;
        break;
      }
    }
    if (firstBad < 0) {
      return chunk;
    }

    if (nonFiniteSamples === "reject") {
      throw new OnsetDetectorError(
        `Chunk contains a non-finite sample at index ${firstBad}`,
        "non_finite_sample"
      );
    }

    for (let i = 0; i < chunkSize; i += 1) {
      const s = chunk[i];
      this.sanitized[i] = Number.isFinite(Math.fround(s)) ? s : 0;
    }
    if (!this.warnedNonFinite) {
      this.warnedNonFinite = true;
      this.logger.warn("replacing non-finite samples with 0", {
        chunkIndex: this.history.totalPushed,
        sampleIndex: firstBad,
      });
    }
    return this.sanitized;
  }

  // σ = λ·median(O[0..M)) + α·mean(O[0..M)) + w·highestPeak
  private computeThreshold(): number {
    const { lambda, alpha, highestPeakWeight } = this.config.threshold;
    this.history.copyRecent(this.recent);
    this.threshold =
      lambda * median(this.recent) +
      alpha * mean(this.recent) +
      this.highestPeak * highestPeakWeight;
    return this.threshold;
  }

  private pickPeak(threshold: number): number | null {
    const curr = this.history.at(0) ?? 0;
    const prev = this.history.at(1) ?? 0;
    const prevPrev = this.history.at(2) ?? 0;

    if (prev > curr && prev > prevPrev && prev > threshold) {
      this.highestPeak = Math.max(this.highestPeak, prev);
      return prev;
    }
    return null;
  }
}
