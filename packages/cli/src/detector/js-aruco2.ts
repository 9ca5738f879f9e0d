import { createRequire } from 'node:module';

import {
  ConfigurationError,
  DetectorError,
  ErrorCode,
  TimeProfiler,
  estimateTagPose,
  type Detection,
  type DetectorAdapter,
  type DetectorOptions,
  type DetectResult,
  type FamilyDescriptor,
  type InputImage,
  type Point,
} from '@fiducial-bench/core';

import { blurOrSharpen, decimate, toRgba } from './preprocess.js';

type ArucoModule = typeof import('js-aruco2');
export type ArucoLibrary = ArucoModule['AR'];
/** The part of the library namespace the adapter calls */
export type ArucoNamespace = Pick<ArucoLibrary, 'Detector' | 'DICTIONARIES'>;
type ArucoDetector = InstanceType<ArucoNamespace['Detector']>;

const require = createRequire(import.meta.url);

const DICTIONARY_MODULE_NAME = /^[A-Za-z0-9_]+$/;
const MISSING_MODULE_CODES: ReadonlySet<string> = new Set([
  'MODULE_NOT_FOUND',
  'ERR_PACKAGE_PATH_NOT_EXPORTED',
]);

export const UNKNOWN_FAMILY_MESSAGE =
  'Unrecognized tag family name. Use e.g. "tag36h11".';

export interface ArucoHandle {
  readonly family: FamilyDescriptor;
  readonly dictionaryName: string;
  readonly options: DetectorOptions;
  detector: ArucoDetector | null;
}

export interface ArucoAdapterOptions {
  /** Library namespace; loaded from `js-aruco2` when omitted */
  ar?: ArucoNamespace;
  /**
   * Registers a dictionary the namespace does not list yet. Defaults to
   * {@link requireDictionary} for the bundled library, a no-op for `ar`.
   */
  loadDictionary?: (dictionaryName: string) => void;
  /** Receives one line per configuration the library cannot honour */
  warn?: (message: string) => void;
  /** Microsecond clock for the timing profile */
  now?: () => number;
}

export interface ArucoAdapter extends DetectorAdapter<ArucoHandle> {
  configure(family: string, options: DetectorOptions): ArucoHandle;
  detect(handle: ArucoHandle, image: InputImage): Promise<DetectResult>;
  release(handle: ArucoHandle): void;
}

/** `tag36h11` → `APRILTAG_36h11`; library dictionary names pass through */
export function dictionaryNameFor(family: string): string {
  const match = /^tag(\d+)h(\d+)$/.exec(family);
  if (match) return `APRILTAG_${match[1]}h${match[2]}`;
  return family;
}

export function describeFamily(
  family: string,
  dictionaryName: string,
  definition: { nBits: number; tau?: number }
): FamilyDescriptor {
  const suffix = /(\d+)h(\d+)$/.exec(dictionaryName);
  const bits = suffix ? Number(suffix[1]) : definition.nBits;
  const minHamming = suffix ? Number(suffix[2]) : (definition.tau ?? 0);
  return {
    name: family,
    bitsPerSide: Math.round(Math.sqrt(bits)),
    minHamming,
  };
}

export function unsupportedOptions(options: DetectorOptions): string[] {
  const ignored: string[] = [];
  if (options.border !== 1) ignored.push(`border=${options.border}`);
  if (options.refineDecode) ignored.push('refineDecode');
  if (options.refinePose) ignored.push('refinePose');
  if (options.quadContours) ignored.push('quadContours');
  return ignored;
}

export function loadAruco(): ArucoLibrary {
  const mod: ArucoModule = require('js-aruco2');
  return mod.AR;
}

function isMissingModule(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    MISSING_MODULE_CODES.has(error.code)
  );
}

/**
 * The library's entry point registers only its ArUco dictionaries; every
 * other one (the AprilTag families among them) is a module under
 * `src/dictionaries/` that adds itself to `AR.DICTIONARIES` when required.
 * A name with no such module is left for the caller to reject.
 */
export function requireDictionary(dictionaryName: string): void {
  if (!DICTIONARY_MODULE_NAME.test(dictionaryName)) return;
  try {
    require(`js-aruco2/src/dictionaries/${dictionaryName.toLowerCase()}.js`);
  } catch (error) {
    if (isMissingModule(error)) return;
    throw error;
  }
}

function centroid(corners: readonly Point[]): Point {
  const sum = corners.reduce(
    (acc, corner) => ({ x: acc.x + corner.x, y: acc.y + corner.y }),
    { x: 0, y: 0 }
  );
  return { x: sum.x / corners.length, y: sum.y / corners.length };
}

/**
 * Detector Adapter backed by js-aruco2. The library sees an RGBA copy of the
 * preprocessed gray image; corners are scaled back to input coordinates.
 */
export function createArucoAdapter(
  adapterOptions: ArucoAdapterOptions = {}
): ArucoAdapter {
  let ar = adapterOptions.ar;
  const warn = adapterOptions.warn ?? (() => {});
  const loadDictionary =
    adapterOptions.loadDictionary ??
    (adapterOptions.ar ? () => {} : requireDictionary);

  return {
    name: 'js-aruco2',

    configure(family, options) {
      const lib = (ar ??= loadAruco());
      const dictionaryName = dictionaryNameFor(family);
      if (!lib.DICTIONARIES[dictionaryName]) loadDictionary(dictionaryName);
      const definition = lib.DICTIONARIES[dictionaryName];
      if (!definition) {
        throw new ConfigurationError({
          message: UNKNOWN_FAMILY_MESSAGE,
          errorCode: ErrorCode.UNKNOWN_FAMILY,
          context: {
            option: 'family',
            value: family,
            suggestion: `Known dictionaries: ${Object.keys(lib.DICTIONARIES).join(', ')}`,
          },
        });
      }

      const ignored = unsupportedOptions(options);
      if (ignored.length > 0) {
        warn(`detector ignores: ${ignored.join(', ')}`);
      }
      if (options.debug) {
        warn(`detector dictionary: ${dictionaryName}`);
      }

      return {
        family: describeFamily(family, dictionaryName, definition),
        dictionaryName,
        options,
        detector: new lib.Detector({ dictionaryName }),
      };
    },

    async detect(handle, image) {
      const detector = handle.detector;
      if (!detector) {
        throw new DetectorError({
          message: 'Detector handle was already released',
        });
      }
      const profiler = new TimeProfiler({ now: adapterOptions.now });
      profiler.stamp('init');

      let working: InputImage = await decimate(image, handle.options.decimate);
      const scale =
        working === image ? 1 : Math.floor(handle.options.decimate);
      profiler.stamp('decimate');

      working = await blurOrSharpen(working, handle.options.blur);
      profiler.stamp('blur/sharp');

      const markers = detector.detect({
        width: working.width,
        height: working.height,
        data: toRgba(working),
      });
      profiler.stamp('detect');

      const detections: Detection[] = [];
      for (const marker of markers) {
        const [c0, c1, c2, c3] = marker.corners.map((corner) => ({
          x: corner.x * scale,
          y: corner.y * scale,
        }));
        if (!c0 || !c1 || !c2 || !c3) continue;
        const corners = [c0, c1, c2, c3] as const;
        detections.push({
          id: marker.id,
          family: handle.family,
          hamming: marker.hammingDistance,
          goodness: 0,
          decisionMargin: handle.family.minHamming - marker.hammingDistance,
          center: centroid(corners),
          corners,
        });
      }
      profiler.stamp('decode+refinement');

      const { camera, tagSize } = handle.options;
      if (camera) {
        detections.forEach((det, index) => {
          const pose = estimateTagPose(det.corners, camera, tagSize);
          if (pose) detections[index] = { ...det, pose };
        });
        profiler.stamp('pose');
      }

      return { detections, profile: profiler.snapshot() };
    },

    release(handle) {
      handle.detector = null;
    },
  };
}
