import { HarnessError, NoDataError } from '../types/errors.js';

export interface RunSummary {
  totalDetections: number;
  totalImages: number;
  failedImages: number;
  totalElapsedMicros: number;
  totalMs: number;
  avgMsPerFrame: number;
}

/**
 * Running totals across every image and iteration of a run. Totals only
 * grow; failed images are tracked separately and never count as processed.
 */
export class RunStatistics {
  private detections = 0;
  private images = 0;
  private failures = 0;
  private elapsedMicros = 0;

  public addImageResult(detectionCount: number, elapsedMicros: number): void {
    if (!Number.isInteger(detectionCount) || detectionCount < 0) {
      throw new HarnessError({
        message: `Detection count must be a non-negative integer, got ${detectionCount}`,
        context: { value: detectionCount },
      });
    }
    if (!Number.isFinite(elapsedMicros) || elapsedMicros < 0) {
      throw new HarnessError({
        message: `Elapsed time must be a non-negative number, got ${elapsedMicros}`,
        context: { value: elapsedMicros },
      });
    }
    this.detections += detectionCount;
    this.images += 1;
    this.elapsedMicros += elapsedMicros;
  }

  public recordFailure(): void {
    this.failures += 1;
  }

  public get totalImages(): number {
    return this.images;
  }

  public get failedImages(): number {
    return this.failures;
  }

  /**
   * @throws NoDataError when no image has been processed yet
   */
  public summary(): RunSummary {
    if (this.images === 0) {
      throw new NoDataError();
    }
    const totalMs = this.elapsedMicros * 1e-3;
    return {
      totalDetections: this.detections,
      totalImages: this.images,
      failedImages: this.failures,
      totalElapsedMicros: this.elapsedMicros,
      totalMs,
      avgMsPerFrame: totalMs / this.images,
    };
  }
}
