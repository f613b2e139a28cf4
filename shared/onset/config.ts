import { z } from "zod";
import { OnsetDetectorError } from "./errors.ts";

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_WINDOW_CHUNKS = 4;
export const DEFAULT_LOOKBACK = 10;

const thresholdSchema = z.object({
  lambda: z.number().finite().default(1.0),
  alpha: z.number().finite().default(0.7),
  lookback: z.number().int().positive().default(DEFAULT_LOOKBACK),
  highestPeakWeight: z.number().finite().default(0.05),
});

export const processorConfigSchema = z.object({
  mode: z.enum(["energy", "spectral-difference"]).default("energy"),
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  windowChunks: z.number().int().positive().default(DEFAULT_WINDOW_CHUNKS),
  threshold: thresholdSchema.default({}),
  nonFiniteSamples: z.enum(["reject", "zero"]).default("reject"),
  verbose: z.boolean().default(false),
});

export type OnsetDetectionMode = z.infer<typeof processorConfigSchema>["mode"];
export type ThresholdParams = z.infer<typeof thresholdSchema>;
export type ProcessorConfig = z.infer<typeof processorConfigSchema>;
export type ProcessorConfigInput = z.input<typeof processorConfigSchema>;

export function resolveProcessorConfig(input: unknown = {}): ProcessorConfig {
  const parsed = processorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new OnsetDetectorError(`Invalid onset processor config: ${issues}`, "invalid_config");
  }
  return parsed.data;
}

function readPositiveInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }
  return parsed;
}

function readNonFinitePolicy(value: string | undefined): "reject" | "zero" | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === "reject" || normalized === "zero" ? normalized : undefined;
}

export function loadProcessorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ProcessorConfig {
  return resolveProcessorConfig({
    chunkSize: readPositiveInt(env.ONSET_CHUNK_SIZE),
    windowChunks: readPositiveInt(env.ONSET_WINDOW_CHUNKS),
    threshold: {
      lookback: readPositiveInt(env.ONSET_LOOKBACK),
    },
    nonFiniteSamples: readNonFinitePolicy(env.ONSET_NON_FINITE),
    verbose: env.ONSET_VERBOSE === "true",
  });
}
