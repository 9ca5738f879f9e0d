import type {
  Detection,
  DetectorAdapter,
  DetectorOptions,
  DetectResult,
} from '../detector/types.js';
import { DecodeError } from '../types/errors.js';
import {
  createInputImage,
  createRaster,
  type DecodedImage,
  type InputImage,
} from '../image/raster.js';
import type { ImageDecoder } from '../pipeline/types.js';
import type { OutputSink } from '../util/output.js';
import type { TimingProfile } from '../util/time-profile.js';

export interface BufferSink extends OutputSink {
  out: string[];
  err: string[];
  stdoutText(): string;
  stderrText(): string;
}

export function createBufferSink(): BufferSink {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    stdoutText: () => out.join(''),
    stderrText: () => err.join(''),
  };
}

export const TAG36H11 = {
  name: 'tag36h11',
  bitsPerSide: 6,
  minHamming: 11,
} as const;

export function fakeDetection(overrides: Partial<Detection> = {}): Detection {
  return {
    id: 0,
    family: TAG36H11,
    hamming: 0,
    goodness: 0,
    decisionMargin: 42.5,
    center: { x: 10, y: 10 },
    corners: [
      { x: 5, y: 5 },
      { x: 15, y: 5 },
      { x: 15, y: 15 },
      { x: 5, y: 15 },
    ],
    ...overrides,
  };
}

/** Single `detect` stage lasting `micros` */
export function fixedProfile(micros: number): TimingProfile {
  return { startMicros: 0, stamps: [{ name: 'detect', micros }] };
}

export type ScriptEntry = readonly Detection[] | 'unreadable' | 'detector-fails';

export interface ScriptedRun {
  decode: ImageDecoder;
  detector: DetectorAdapter<{ family: string }> & {
    configured: Array<{ family: string; options: DetectorOptions }>;
    released: number;
    detectCalls: string[];
  };
}

/**
 * In-process decoder and detector that replay a script keyed by path.
 * Every processed image takes `microsPerImage` microseconds.
 */
export function createScriptedRun(
  script: Record<string, ScriptEntry>,
  microsPerImage = 1500
): ScriptedRun {
  const pathsByImage = new WeakMap<InputImage, string>();

  const decode: ImageDecoder = async (path): Promise<DecodedImage> => {
    const entry = script[path];
    if (entry === undefined || entry === 'unreadable') {
      throw new DecodeError({
        message: `Error loading ${path}`,
        context: { path },
        cause: new Error('no such file'),
      });
    }
    const gray = createInputImage(20, 20);
    pathsByImage.set(gray, path);
    return {
      gray,
      original: createRaster({ width: 20, height: 20, channels: 1 }),
    };
  };

  const configured: Array<{ family: string; options: DetectorOptions }> = [];
  const detectCalls: string[] = [];
  const detector: ScriptedRun['detector'] = {
    name: 'scripted',
    configured,
    released: 0,
    detectCalls,
    configure(family, options) {
      configured.push({ family, options });
      return { family };
    },
    detect(_handle, image): DetectResult {
      const path = pathsByImage.get(image) ?? '<unknown>';
      detectCalls.push(path);
      const entry = script[path];
      if (entry === 'detector-fails') {
        throw new Error('quad extraction failed');
      }
      return {
        detections: typeof entry === 'object' ? entry : [],
        profile: fixedProfile(microsPerImage),
      };
    },
    release() {
      detector.released += 1;
    },
  };

  return { decode, detector };
}
