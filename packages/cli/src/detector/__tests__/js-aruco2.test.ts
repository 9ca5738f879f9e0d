import { describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  DetectorError,
  ErrorCode,
  createInputImage,
  resolveRunConfiguration,
  toDetectorOptions,
  type RunOptions,
} from '@fiducial-bench/core';

import {
  UNKNOWN_FAMILY_MESSAGE,
  createArucoAdapter,
  dictionaryNameFor,
  type ArucoNamespace,
} from '../js-aruco2.js';

interface SeenImage {
  width: number;
  height: number;
  length: number;
}

interface FakeMarker {
  id: number;
  corners: Array<{ x: number; y: number }>;
  hammingDistance: number;
}

function createFakeAruco(markers: FakeMarker[] = []): {
  ar: ArucoNamespace;
  configs: Array<{ dictionaryName?: string }>;
  seen: SeenImage[];
} {
  const configs: Array<{ dictionaryName?: string }> = [];
  const seen: SeenImage[] = [];

  class FakeDetector {
    constructor(config?: { dictionaryName?: string }) {
      configs.push(config ?? {});
    }

    detect(image: {
      width: number;
      height: number;
      data: Uint8ClampedArray;
    }): FakeMarker[] {
      seen.push({
        width: image.width,
        height: image.height,
        length: image.data.length,
      });
      return markers;
    }
  }

  return {
    ar: {
      Detector: FakeDetector,
      DICTIONARIES: {
        ARUCO: { nBits: 25, tau: 3, codeList: [] },
        ARUCO_MIP_36h12: { nBits: 36, tau: 12, codeList: [] },
        APRILTAG_36h11: { nBits: 36, tau: 11, codeList: [] },
        APRILTAG_25h9: { nBits: 25, tau: 9, codeList: [] },
      },
    },
    configs,
    seen,
  };
}

const options = (overrides: RunOptions = {}) =>
  toDetectorOptions(resolveRunConfiguration(overrides));

function sequenceClock(): () => number {
  let now = 0;
  return () => (now += 100);
}

describe('dictionaryNameFor', () => {
  it('maps tag family names onto AprilTag dictionaries', () => {
    expect(dictionaryNameFor('tag36h11')).toBe('APRILTAG_36h11');
    expect(dictionaryNameFor('tag16h5')).toBe('APRILTAG_16h5');
    expect(dictionaryNameFor('ARUCO_MIP_36h12')).toBe('ARUCO_MIP_36h12');
  });
});

describe('createArucoAdapter', () => {
  it('configures a library detector for the family', () => {
    const fake = createFakeAruco();
    const adapter = createArucoAdapter({ ar: fake.ar });

    const handle = adapter.configure('tag36h11', options());

    expect(handle).toMatchObject({
      dictionaryName: 'APRILTAG_36h11',
      family: { name: 'tag36h11', bitsPerSide: 6, minHamming: 11 },
    });
    expect(fake.configs).toEqual([{ dictionaryName: 'APRILTAG_36h11' }]);
  });

  it('accepts library dictionary names verbatim', () => {
    const adapter = createArucoAdapter({ ar: createFakeAruco().ar });
    expect(adapter.configure('ARUCO_MIP_36h12', options()).family).toEqual({
      name: 'ARUCO_MIP_36h12',
      bitsPerSide: 6,
      minHamming: 12,
    });
    expect(adapter.configure('ARUCO', options()).family).toEqual({
      name: 'ARUCO',
      bitsPerSide: 5,
      minHamming: 3,
    });
  });

  it('rejects an unknown family', () => {
    const adapter = createArucoAdapter({ ar: createFakeAruco().ar });
    let caught: unknown;
    try {
      adapter.configure('tag99h1', options());
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message).toBe(UNKNOWN_FAMILY_MESSAGE);
      expect(caught.errorCode).toBe(ErrorCode.UNKNOWN_FAMILY);
      expect(caught.getExitCode()).toBe(255);
    }
  });

  it('warns once about options the library cannot honour', () => {
    const warn = vi.fn();
    const adapter = createArucoAdapter({ ar: createFakeAruco().ar, warn });

    adapter.configure(
      'tag36h11',
      options({ border: 2, refinePose: true, quadContours: true })
    );

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'detector ignores: border=2, refinePose, quadContours'
    );
  });

  it('stays quiet for a plain configuration', () => {
    const warn = vi.fn();
    const adapter = createArucoAdapter({ ar: createFakeAruco().ar, warn });
    adapter.configure('tag36h11', options());
    expect(warn).not.toHaveBeenCalled();
  });

  it('maps markers to detections in input coordinates', async () => {
    const fake = createFakeAruco([
      {
        id: 42,
        hammingDistance: 1,
        corners: [
          { x: 1, y: 1 },
          { x: 4, y: 1 },
          { x: 4, y: 4 },
          { x: 1, y: 4 },
        ],
      },
      { id: 7, hammingDistance: 0, corners: [{ x: 0, y: 0 }] },
    ]);
    const adapter = createArucoAdapter({ ar: fake.ar, now: sequenceClock() });
    const handle = adapter.configure('tag36h11', options({ decimate: 2 }));

    const result = await adapter.detect(handle, createInputImage(20, 10));

    expect(fake.seen).toEqual([{ width: 10, height: 5, length: 200 }]);
    expect(result.detections).toEqual([
      {
        id: 42,
        family: { name: 'tag36h11', bitsPerSide: 6, minHamming: 11 },
        hamming: 1,
        goodness: 0,
        decisionMargin: 10,
        center: { x: 5, y: 5 },
        corners: [
          { x: 2, y: 2 },
          { x: 8, y: 2 },
          { x: 8, y: 8 },
          { x: 2, y: 8 },
        ],
      },
    ]);
    expect(result.profile.stamps.map((stamp) => stamp.name)).toEqual([
      'init',
      'decimate',
      'blur/sharp',
      'detect',
      'decode+refinement',
    ]);
    // Constructor reads the clock once, then one tick per stamp
    expect(result.profile.startMicros).toBe(100);
    expect(result.profile.stamps.at(-1)?.micros).toBe(600);
  });

  it('estimates a pose per detection when given camera intrinsics', async () => {
    const fake = createFakeAruco([
      {
        id: 3,
        hammingDistance: 0,
        corners: [
          { x: 40, y: 40 },
          { x: 60, y: 40 },
          { x: 60, y: 60 },
          { x: 40, y: 60 },
        ],
      },
    ]);
    const adapter = createArucoAdapter({ ar: fake.ar, now: sequenceClock() });
    const handle = adapter.configure(
      'tag36h11',
      options({
        cameraParams: { fx: 100, fy: 100, cx: 50, cy: 50 },
        tagSize: 2,
      })
    );

    const result = await adapter.detect(handle, createInputImage(100, 100));

    const [det] = result.detections;
    expect(det?.pose?.translation[0]).toBeCloseTo(0, 9);
    expect(det?.pose?.translation[1]).toBeCloseTo(0, 9);
    expect(det?.pose?.translation[2]).toBeCloseTo(10, 9);
    expect(det?.pose?.error).toBeCloseTo(0, 9);
    expect(result.profile.stamps.at(-1)?.name).toBe('pose');
  });

  it('leaves detections without a pose when no camera is given', async () => {
    const fake = createFakeAruco([
      {
        id: 3,
        hammingDistance: 0,
        corners: [
          { x: 40, y: 40 },
          { x: 60, y: 40 },
          { x: 60, y: 60 },
          { x: 40, y: 60 },
        ],
      },
    ]);
    const adapter = createArucoAdapter({ ar: fake.ar });
    const handle = adapter.configure('tag36h11', options());

    const result = await adapter.detect(handle, createInputImage(100, 100));

    expect(result.detections[0]?.pose).toBeUndefined();
  });

  it('loads a dictionary the namespace does not list yet', () => {
    const fake = createFakeAruco();
    const loaded: string[] = [];
    const adapter = createArucoAdapter({
      ar: fake.ar,
      loadDictionary: (name) => {
        loaded.push(name);
        fake.ar.DICTIONARIES[name] = { nBits: 16, tau: 5, codeList: [] };
      },
    });

    const handle = adapter.configure('tag16h5', options());

    expect(loaded).toEqual(['APRILTAG_16h5']);
    expect(handle.family).toEqual({
      name: 'tag16h5',
      bitsPerSide: 4,
      minHamming: 5,
    });
    adapter.configure('tag36h11', options());
    expect(loaded).toEqual(['APRILTAG_16h5']);
  });

  it('refuses to detect with a released handle', async () => {
    const adapter = createArucoAdapter({ ar: createFakeAruco().ar });
    const handle = adapter.configure('tag36h11', options());
    adapter.release(handle);

    await expect(
      adapter.detect(handle, createInputImage(4, 4))
    ).rejects.toBeInstanceOf(DetectorError);
  });
});
