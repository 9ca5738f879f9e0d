import { HarnessError } from '../types/errors.js';

const DEFAULT_HAMMING_BINS = 10;

/**
 * Per-image tally of detections by corrected bit errors.
 *
 * Distances outside `0..bins-1` are not attributed to a bucket; they are
 * counted in `overflow()` instead so the tally never writes past its bound.
 */
export class HammingHistogram {
  private readonly counts: number[];
  private beyond = 0;

  constructor(public readonly bins: number = DEFAULT_HAMMING_BINS) {
    if (!Number.isInteger(bins) || bins <= 0) {
      throw new HarnessError({
        message: `Hamming histogram needs a positive bucket count, got ${bins}`,
        context: { value: bins },
      });
    }
    this.counts = new Array<number>(bins).fill(0);
  }

  public reset(): void {
    this.counts.fill(0);
    this.beyond = 0;
  }

  public record(distance: number): void {
    if (Number.isInteger(distance) && distance >= 0 && distance < this.bins) {
      this.counts[distance] = (this.counts[distance] ?? 0) + 1;
      return;
    }
    this.beyond += 1;
  }

  public buckets(): number[] {
    return [...this.counts];
  }

  /** Sum of all buckets; excludes overflow */
  public total(): number {
    return this.counts.reduce((sum, count) => sum + count, 0);
  }

  public overflow(): number {
    return this.beyond;
  }
}
