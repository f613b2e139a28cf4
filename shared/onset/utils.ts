import { OnsetDetectorError } from "./errors.ts";

export function mean(values: ArrayLike<number>): number {
  const n = values.length;
  if (n === 0) {
    throw new OnsetDetectorError("mean() needs at least one value", "empty_sample_set");
  }
  let sum = 0;
  for (let i = 0; i < n; i += 1) sum += values[i];
  return sum / n;
}

/**
 * Median of a copy of `values`, sorted ascending.
 *
 * Even-length sets return the mean of `sorted[mid - 1, mid)`, which is the
 * lower-middle element alone (`median([1, 2, 3, 4]) === 2`). The threshold
 * weights in the processor are tuned against this definition.
 */
export function median(values: ArrayLike<number>): number {
  const n = values.length;
  if (n === 0) {
    throw new OnsetDetectorError("median() needs at least one value", "empty_sample_set");
  }
  const sorted = new Float64Array(n);
  for (let i = 0; i < n; i += 1) {
    const v = values[i];
    if (Number.isNaN(v)) {
      throw new OnsetDetectorError("median() cannot order NaN", "non_finite_value");
    }
    sorted[i] = v;
  }
  sorted.sort();
  const mid = Math.floor(n / 2);
  if (n % 2 === 0) {
    return mean(sorted.subarray(mid - 1, mid));
  }
  return sorted[mid];
}
