import test from "node:test";
import assert from "node:assert/strict";
import { loadProcessorConfigFromEnv, resolveProcessorConfig } from "../shared/onset/config";
import { OnsetDetectorError } from "../shared/onset/errors";

const DEFAULTS = {
  mode: "energy",
  chunkSize: 512,
  windowChunks: 4,
  threshold: { lambda: 1, alpha: 0.7, lookback: 10, highestPeakWeight: 0.05 },
  nonFiniteSamples: "reject",
  verbose: false,
};

test("resolveProcessorConfig fills every default", () => {
  assert.deepEqual(resolveProcessorConfig(), DEFAULTS);
  assert.deepEqual(resolveProcessorConfig({}), DEFAULTS);
});

test("partial threshold overrides keep the other threshold defaults", () => {
  const config = resolveProcessorConfig({ threshold: { alpha: 0.5 } });
  assert.deepEqual(config.threshold, {
    lambda: 1,
    alpha: 0.5,
    lookback: 10,
    highestPeakWeight: 0.05,
  });
});

test("invalid config values are reported with their path", () => {
  assert.throws(
    () => resolveProcessorConfig({ chunkSize: 0 }),
    (error: unknown) =>
      error instanceof OnsetDetectorError &&
      error.code === "invalid_config" &&
      /chunkSize/.test(error.message)
  );
  assert.throws(
    () => resolveProcessorConfig({ threshold: { lookback: 2.5 } }),
    (error: unknown) =>
      error instanceof OnsetDetectorError && /threshold\.lookback/.test(error.message)
  );
  assert.throws(
    () => resolveProcessorConfig({ mode: "complex-domain" }),
    (error: unknown) => error instanceof OnsetDetectorError && error.code === "invalid_config"
  );
});

test("loadProcessorConfigFromEnv reads overrides and ignores junk", () => {
  const config = loadProcessorConfigFromEnv({
    ONSET_CHUNK_SIZE: " 256 ",
    ONSET_WINDOW_CHUNKS: "-3",
    ONSET_LOOKBACK: "abc",
    ONSET_NON_FINITE: "ZERO",
    ONSET_VERBOSE: "true",
  });

  assert.equal(config.chunkSize, 256);
  assert.equal(config.windowChunks, 4);
  assert.equal(config.threshold.lookback, 10);
  assert.equal(config.nonFiniteSamples, "zero");
  assert.equal(config.verbose, true);
});

test("an empty environment yields the defaults", () => {
  assert.deepEqual(loadProcessorConfigFromEnv({}), DEFAULTS);
});
