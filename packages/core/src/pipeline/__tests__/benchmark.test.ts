import { describe, it, expect, vi } from 'vitest';

import { runBenchmark } from '../benchmark.js';
import type { DisplayRequest, ImageRecord } from '../types.js';
import { ErrorCode } from '../../errors/codes.js';
import { ConfigurationError } from '../../types/errors.js';
import { resolveRunConfiguration } from '../../types/options.js';
import {
  createBufferSink,
  createScriptedRun,
  fakeDetection,
} from '../../test-utils/fakes.js';

describe('runBenchmark', () => {
  it('processes every image in every iteration, in input order', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection({ id: 3 })],
      'b.png': [fakeDetection({ id: 7 })],
    });
    const records: ImageRecord[] = [];
    const sink = createBufferSink();

    const outcome = await runBenchmark({
      config: resolveRunConfiguration({ iterations: 2, display: false }),
      inputs: ['a.png', 'b.png'],
      detector,
      decode,
      sink,
      hooks: { onImage: (record) => records.push(record) },
    });

    expect(detector.detectCalls).toEqual(['a.png', 'b.png', 'a.png', 'b.png']);
    expect(outcome.summary).toMatchObject({
      totalDetections: 4,
      totalImages: 4,
      failedImages: 0,
    });
    expect(records.map((r) => `${r.iteration}:${r.path}`)).toEqual([
      '1:a.png',
      '1:b.png',
      '2:a.png',
      '2:b.png',
    ]);
    for (const record of records) {
      expect(record.status).toBe('ok');
      if (record.status === 'ok') {
        expect(record.histogram[0]).toBe(1);
      }
    }
    expect(sink.out.filter((line) => line.startsWith('Iteration'))).toEqual([
      'Iteration 1 / 2\n',
      'Iteration 2 / 2\n',
    ]);
  });

  it('resets the histogram for each image', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection({ hamming: 1 }), fakeDetection({ hamming: 1 })],
      'b.png': [fakeDetection({ hamming: 2 })],
    });
    const records: ImageRecord[] = [];

    await runBenchmark({
      config: resolveRunConfiguration({ hammingBins: 4, display: false }),
      inputs: ['a.png', 'b.png'],
      detector,
      decode,
      sink: createBufferSink(),
      hooks: { onImage: (record) => records.push(record) },
    });

    const histograms = records.map((r) =>
      r.status === 'ok' ? r.histogram : []
    );
    expect(histograms).toEqual([
      [0, 2, 0, 0],
      [0, 0, 1, 0],
    ]);
  });

  it('counts distances beyond the last bucket as overflow', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection({ hamming: 12 })],
    });
    const records: ImageRecord[] = [];

    await runBenchmark({
      config: resolveRunConfiguration({ display: false }),
      inputs: ['a.png'],
      detector,
      decode,
      sink: createBufferSink(),
      hooks: { onImage: (record) => records.push(record) },
    });

    expect(records[0]).toMatchObject({
      status: 'ok',
      histogram: [0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
      overflow: 1,
    });
  });

  it('skips an unreadable image and keeps going', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection()],
      'c.png': [fakeDetection()],
    });
    const sink = createBufferSink();
    const records: ImageRecord[] = [];

    const outcome = await runBenchmark({
      config: resolveRunConfiguration({ quiet: true, display: false }),
      inputs: ['a.png', 'missing.png', 'c.png'],
      detector,
      decode,
      sink,
      hooks: { onImage: (record) => records.push(record) },
    });

    expect(detector.detectCalls).toEqual(['a.png', 'c.png']);
    expect(outcome.summary?.totalImages).toBe(2);
    expect(outcome.summary?.failedImages).toBe(1);
    expect(sink.err).toEqual([
      '[fiducial-bench] Error loading missing.png: no such file\n',
    ]);
    expect(records[1]).toEqual({
      status: 'failed',
      iteration: 1,
      index: 1,
      path: 'missing.png',
      errorCode: ErrorCode.DECODE_ERROR,
      error: 'Error loading missing.png',
    });
  });

  it('skips an image the detector fails on', async () => {
    const { decode, detector } = createScriptedRun({
      'bad.png': 'detector-fails',
      'good.png': [fakeDetection({ id: 5 })],
    });
    const sink = createBufferSink();

    const outcome = await runBenchmark({
      config: resolveRunConfiguration({ benchmark: true }),
      inputs: ['bad.png', 'good.png'],
      detector,
      decode,
      sink,
    });

    expect(outcome.summary?.totalDetections).toBe(1);
    expect(sink.out).toEqual(['bad.png\n', 'good.png 5\n']);
    expect(sink.err[0]).toBe(
      '[fiducial-bench] Detector failed on bad.png: quad extraction failed\n'
    );
  });

  it('reports throughput in benchmark mode', async () => {
    const { decode, detector } = createScriptedRun(
      {
        'dir/a.png': [fakeDetection({ id: 3 })],
        'dir/b.png': [fakeDetection({ id: 7, hamming: 1 })],
      },
      1500
    );
    const sink = createBufferSink();

    await runBenchmark({
      config: resolveRunConfiguration({ benchmark: true, iterations: 2 }),
      inputs: ['dir/a.png', 'dir/b.png'],
      detector,
      decode,
      sink,
    });

    expect(sink.out).toEqual([
      'a.png 3\n',
      'b.png 7\n',
      'a.png 3\n',
      'b.png 7\n',
    ]);
    expect(sink.err).toEqual([
      '4 detections over 4 images in 6.000 ms (1.500 ms per frame)\n',
    ]);
  });

  it('returns no summary when nothing could be processed', async () => {
    const { decode, detector } = createScriptedRun({});
    const outcome = await runBenchmark({
      config: resolveRunConfiguration({ display: false }),
      inputs: ['x.png'],
      detector,
      decode,
      sink: createBufferSink(),
    });

    expect(outcome.summary).toBeNull();
    expect(outcome.statistics.failedImages).toBe(1);
  });

  it('configures once and releases the handle once', async () => {
    const { decode, detector } = createScriptedRun({ 'a.png': [] });

    await runBenchmark({
      config: resolveRunConfiguration({
        iterations: 3,
        family: 'tag25h9',
        display: false,
      }),
      inputs: ['a.png'],
      detector,
      decode,
      sink: createBufferSink(),
    });

    expect(detector.configured).toHaveLength(1);
    expect(detector.configured[0]?.family).toBe('tag25h9');
    expect(detector.released).toBe(1);
  });

  it('releases the handle when the loop throws', async () => {
    const { decode, detector } = createScriptedRun({ 'a.png': [] });

    await expect(
      runBenchmark({
        config: resolveRunConfiguration({ display: false }),
        inputs: ['a.png'],
        detector,
        decode,
        sink: createBufferSink(),
        hooks: {
          onImage: () => {
            throw new Error('hook exploded');
          },
        },
      })
    ).rejects.toThrow('hook exploded');
    expect(detector.released).toBe(1);
  });

  it('keeps the body error when releasing the handle also fails', async () => {
    const { decode, detector } = createScriptedRun({ 'a.png': [] });
    const sink = createBufferSink();
    const failingRelease = {
      ...detector,
      release: () => {
        throw new Error('handle already gone');
      },
    };

    await expect(
      runBenchmark({
        config: resolveRunConfiguration({ display: false }),
        inputs: ['a.png'],
        detector: failingRelease,
        decode,
        sink,
        hooks: {
          onImage: () => {
            throw new Error('hook exploded');
          },
        },
      })
    ).rejects.toThrow('hook exploded');
    expect(sink.err).toEqual([
      '[fiducial-bench] Detector release failed: handle already gone\n',
    ]);
  });

  it('never decodes when the detector cannot be configured', async () => {
    const { detector } = createScriptedRun({});
    const decode = vi.fn();
    const failing = {
      ...detector,
      configure: () => {
        throw new ConfigurationError({
          message: 'Unrecognized tag family name. Use e.g. "tag36h11".',
          errorCode: ErrorCode.UNKNOWN_FAMILY,
        });
      },
    };

    await expect(
      runBenchmark({
        config: resolveRunConfiguration({ family: 'nope', display: false }),
        inputs: ['a.png'],
        detector: failing,
        decode,
        sink: createBufferSink(),
      })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(decode).not.toHaveBeenCalled();
  });

  it('hands the blended overlay to the display', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection()],
    });
    const display = vi.fn(async (_request: DisplayRequest) => {});

    await runBenchmark({
      config: resolveRunConfiguration({ quiet: true }),
      inputs: ['a.png'],
      detector,
      decode,
      display,
      sink: createBufferSink(),
    });

    expect(display).toHaveBeenCalledTimes(1);
    const request = display.mock.calls[0]?.[0];
    expect(request?.path).toBe('a.png');
    expect(request?.iteration).toBe(1);
    // Corner (5, 5) is on the boundary; the source pixel is black
    expect(request?.blended.data[5 * 20 + 5]).toBe(128);
    expect(request?.original.data[5 * 20 + 5]).toBe(0);
  });

  it('logs a failing display and moves on to the next image', async () => {
    const { decode, detector } = createScriptedRun({
      'a.png': [fakeDetection({ id: 1 })],
      'b.png': [fakeDetection({ id: 2 })],
    });
    const sink = createBufferSink();
    const records: ImageRecord[] = [];
    const shown: string[] = [];
    const display = async (request: DisplayRequest): Promise<void> => {
      if (request.path === 'a.png') {
        throw new Error('EACCES: permission denied');
      }
      shown.push(request.path);
    };

    const outcome = await runBenchmark({
      config: resolveRunConfiguration({ quiet: true }),
      inputs: ['a.png', 'b.png'],
      detector,
      decode,
      display,
      sink,
      hooks: { onImage: (record) => records.push(record) },
    });

    expect(detector.detectCalls).toEqual(['a.png', 'b.png']);
    expect(shown).toEqual(['b.png']);
    expect(sink.err).toEqual([
      '[fiducial-bench] Display failed for a.png: EACCES: permission denied\n',
    ]);
    expect(records.map((r) => r.status)).toEqual(['ok', 'ok']);
    expect(outcome.summary?.totalDetections).toBe(2);
    expect(detector.released).toBe(1);
  });

  it('notes a missing display once and still runs', async () => {
    const { decode, detector } = createScriptedRun({ 'a.png': [] });
    const sink = createBufferSink();

    await runBenchmark({
      config: resolveRunConfiguration({ quiet: true }),
      inputs: ['a.png'],
      detector,
      decode,
      sink,
    });

    expect(sink.err).toEqual([
      '[fiducial-bench] display requested but no display is available\n',
    ]);
  });
});
