import type { ProcessorConfigInput } from "./config.ts";
import { OnsetDetectorError } from "./errors.ts";
import type { OnsetLogger } from "./logger.ts";
import { OnsetFrameProcessor } from "./processor.ts";
import type { DetectedOnset } from "./types.ts";

/**
 * Runs a fresh processor over a whole signal, chunk by chunk. A trailing
 * partial chunk is zero-padded. Each onset is reported at the chunk whose
 * ODF formed the peak, one chunk before the call that confirmed it.
 */
export function scanSignal(
  samples: ArrayLike<number>,
  params: {
    sampleRate: number;
    config?: ProcessorConfigInput;
    logger?: OnsetLogger;
  }
): DetectedOnset[] {
  const { sampleRate } = params;
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new OnsetDetectorError(`Invalid sample rate: ${sampleRate}`, "invalid_config");
  }

  const processor = new OnsetFrameProcessor({ config: params.config, logger: params.logger });
  const { chunkSize } = processor.config;
  const chunk = new Float32Array(chunkSize);
  const chunkCount = Math.ceil(samples.length / chunkSize);
  const onsets: DetectedOnset[] = [];

  for (let ci = 0; ci < chunkCount; ci += 1) {
    const start = ci * chunkSize;
    for (let i = 0; i < chunkSize; i += 1) {
      chunk[i] = samples[start + i] ?? 0;
    }

    const result = processor.analyze(chunk);
    if (result.onset && result.strength !== null) {
      const chunkIndex = ci - 1;
      onsets.push({
        chunkIndex,
        tMs: ((chunkIndex * chunkSize) / sampleRate) * 1000,
        strength: result.strength,
      });
    }
  }

  return onsets;
}
