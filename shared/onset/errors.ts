export type OnsetDetectorErrorCode =
  | "empty_sample_set"
  | "non_finite_value"
  | "chunk_size_mismatch"
  | "non_finite_sample"
  | "mode_not_implemented"
  | "invalid_config";

export class OnsetDetectorError extends Error {
  public readonly code: OnsetDetectorErrorCode;

  constructor(message: string, code: OnsetDetectorErrorCode) {
    super(message);
    this.name = "OnsetDetectorError";
    this.code = code;
  }
}
