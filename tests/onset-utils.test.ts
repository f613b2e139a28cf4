import test from "node:test";
import assert from "node:assert/strict";
import { mean, median } from "../shared/onset/utils";
import { OnsetDetectorError } from "../shared/onset/errors";

test("mean averages a fixed sample set", () => {
  assert.equal(mean([1, 2, 3, 4]), 2.5);
  assert.equal(mean(new Float32Array([2, 4])), 3);
});

test("median of an odd-length set is the middle element", () => {
  assert.equal(median([1, 2, 3]), 2);
  assert.equal(median([3, 1, 2]), 2);
  assert.equal(median([1]), 1);
});

test("median of an even-length set keeps the lower-middle indexing", () => {
  assert.equal(median([1, 2, 3, 4]), 2);
  assert.equal(median([4, 1, 3, 2]), 2);
  assert.equal(median([9, 5]), 5);
});

test("median sorts a copy and leaves the input untouched", () => {
  const input = [3, 1, 2];
  median(input);
  assert.deepEqual(input, [3, 1, 2]);
});

test("helpers reject empty and unordered input", () => {
  assert.throws(
    () => mean([]),
    (error: unknown) => error instanceof OnsetDetectorError && error.code === "empty_sample_set"
  );
  assert.throws(
    () => median([]),
    (error: unknown) => error instanceof OnsetDetectorError && error.code === "empty_sample_set"
  );
  assert.throws(
    () => median([1, Number.NaN, 2]),
    (error: unknown) => error instanceof OnsetDetectorError && error.code === "non_finite_value"
  );
});
