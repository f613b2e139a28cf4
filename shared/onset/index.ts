export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_LOOKBACK,
  DEFAULT_WINDOW_CHUNKS,
  loadProcessorConfigFromEnv,
  processorConfigSchema,
  resolveProcessorConfig,
} from "./config.ts";
export type {
  OnsetDetectionMode,
  ProcessorConfig,
  ProcessorConfigInput,
  ThresholdParams,
} from "./config.ts";
export {
  DiagnosticRegistry,
  hasDiagnosticHook,
  installDiagnosticHook,
  reportDiagnostic,
} from "./diagnostics.ts";
export type { DiagnosticHook } from "./diagnostics.ts";
export { OnsetDetectorError } from "./errors.ts";
export type { OnsetDetectorErrorCode } from "./errors.ts";
export { Frame } from "./frame.ts";
export type { FrameView } from "./frame.ts";
export { OnsetHistory } from "./history.ts";
export { consoleLogger } from "./logger.ts";
export type { OnsetLogger } from "./logger.ts";
export { OnsetFrameProcessor } from "./processor.ts";
export type { OnsetFrameProcessorOptions } from "./processor.ts";
export { scanSignal } from "./scan.ts";
export type {
  DetectedOnset,
  OnsetFrameResult,
  OnsetPhase,
  OnsetProcessorSnapshot,
} from "./types.ts";
export { mean, median } from "./utils.ts";
