import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { RunStatistics } from '../run-statistics.js';
import { HarnessError, NoDataError } from '../../types/errors.js';

describe('RunStatistics', () => {
  it('throws NoDataError before any image was processed', () => {
    const stats = new RunStatistics();
    expect(() => stats.summary()).toThrow(NoDataError);
    expect(stats.totalImages).toBe(0);
  });

  it('failures alone do not produce a summary', () => {
    const stats = new RunStatistics();
    stats.recordFailure();
    expect(stats.failedImages).toBe(1);
    expect(() => stats.summary()).toThrow(NoDataError);
  });

  it('accumulates detections, images and elapsed time', () => {
    const stats = new RunStatistics();
    stats.addImageResult(3, 2000);
    stats.addImageResult(1, 500);
    stats.recordFailure();

    expect(stats.summary()).toEqual({
      totalDetections: 4,
      totalImages: 2,
      failedImages: 1,
      totalElapsedMicros: 2500,
      totalMs: 2.5,
      avgMsPerFrame: 1.25,
    });
  });

  it('rejects negative or fractional counts and invalid times', () => {
    const stats = new RunStatistics();
    expect(() => stats.addImageResult(-1, 10)).toThrow(HarnessError);
    expect(() => stats.addImageResult(1.5, 10)).toThrow(HarnessError);
    expect(() => stats.addImageResult(1, -10)).toThrow(HarnessError);
    expect(() => stats.addImageResult(1, Number.NaN)).toThrow(HarnessError);
    expect(stats.totalImages).toBe(0);
  });

  it('totals never decrease across successive results', () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.tuple(
            fc.integer({ min: 0, max: 50 }),
            fc.integer({ min: 0, max: 1_000_000 })
          ),
          { minLength: 1, maxLength: 50 }
        ),
        (results) => {
          const stats = new RunStatistics();
          let previous = { detections: 0, images: 0, elapsed: 0 };
          for (const [count, micros] of results) {
            stats.addImageResult(count, micros);
            const summary = stats.summary();
            expect(summary.totalDetections).toBeGreaterThanOrEqual(
              previous.detections
            );
            expect(summary.totalImages).toBeGreaterThan(previous.images);
            expect(summary.totalElapsedMicros).toBeGreaterThanOrEqual(
              previous.elapsed
            );
            previous = {
              detections: summary.totalDetections,
              images: summary.totalImages,
              elapsed: summary.totalElapsedMicros,
            };
          }
        }
      )
    );
  });

  it('average per frame equals total ms over total images', () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 5_000_000 }), {
          minLength: 1,
          maxLength: 40,
        }),
        (times) => {
          const stats = new RunStatistics();
          times.forEach((micros) => stats.addImageResult(1, micros));
          const summary = stats.summary();
          expect(
            Math.abs(
              summary.avgMsPerFrame - summary.totalMs / summary.totalImages
            )
          ).toBeLessThanOrEqual(1e-6);
        }
      )
    );
  });
});
