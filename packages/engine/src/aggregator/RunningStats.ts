import type { Duration, FunctionId, FunctionStats } from "@calltime/contracts";

/**
 * Online mean/variance accumulator (Welford's update), with min and max.
 *
 * O(1) time per sample and O(1) memory regardless of how many samples are
 * pushed. `m2` is the running sum of squared deviations from the mean.
 */
export class RunningStats {
  private n = 0;
  private runningMean = 0;
  private m2 = 0;
  private lo = Infinity;
  private hi = -Infinity;

  get count(): number {
    return this.n;
  }

  get mean(): number {
    return this.runningMean;
  }

  get min(): number {
    return this.lo;
  }

  get max(): number {
    return this.hi;
  }

  /** Sample variance; 0 with fewer than two samples */
  get variance(): number {
    return this.n > 1 ? this.m2 / (this.n - 1) : 0;
  }

  get sampleStdDev(): number {
    return Math.sqrt(this.variance);
  }

  push(x: Duration): void {
    this.n++;
    const delta = x - this.runningMean;
    this.runningMean += delta / this.n;
    this.m2 += delta * (x - this.runningMean);
    if (x < this.lo) this.lo = x;
    if (x > this.hi) this.hi = x;
  }

  /**
   * Fold another accumulator into this one (Chan et al. pairwise update).
   */
  merge(other: RunningStats): void {
    if (other.n === 0) return;
    if (this.n === 0) {
      this.n = other.n;
      this.runningMean = other.runningMean;
      this.m2 = other.m2;
      this.lo = other.lo;
      this.hi = other.hi;
      return;
    }

    const n = this.n + other.n;
    const delta = other.runningMean - this.runningMean;
    this.runningMean += (delta * other.n) / n;
    this.m2 += other.m2 + (delta * delta * this.n * other.n) / n;
    this.n = n;
    if (other.lo < this.lo) this.lo = other.lo;
    if (other.hi > this.hi) this.hi = other.hi;
  }

  toStats(functionId: FunctionId): FunctionStats {
    return Object.freeze({
      functionId,
      count: this.n,
      mean: this.runningMean,
      min: this.lo,
      max: this.hi,
      sampleStdDev: this.sampleStdDev,
    });
  }
}
