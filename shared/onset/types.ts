export type OnsetPhase =
  | { kind: "warming-up"; remaining: number }
  | { kind: "ready" };

export type OnsetFrameResult = {
  onset: boolean;
  odf: number;
  threshold: number | null; // null until warm-up completes
  strength: number | null; // ODF of the confirmed peak, one chunk back
  phase: OnsetPhase;
};

export type OnsetProcessorSnapshot = {
  phase: OnsetPhase;
  threshold: number | null;
  highestPeak: number;
  processedChunks: number;
  history: number[]; // newest first
};

export type DetectedOnset = {
  chunkIndex: number;
  tMs: number;
  strength: number;
};
