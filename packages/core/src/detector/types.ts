import type { InputImage } from '../image/raster.js';
import type { CameraParams, TagPose } from '../pose/tag-pose.js';
import type { TimingProfile } from '../util/time-profile.js';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface FamilyDescriptor {
  readonly name: string;
  /** Payload bits along one side; the family carries bitsPerSide² bits */
  readonly bitsPerSide: number;
  /** Minimum Hamming distance between any two codewords */
  readonly minHamming: number;
}

export interface Detection {
  readonly id: number;
  readonly family: FamilyDescriptor;
  /** Bit errors corrected to reach the accepted codeword */
  readonly hamming: number;
  readonly goodness: number;
  readonly decisionMargin: number;
  readonly center: Point;
  /**
   * Corners in image coordinates (y down), clockwise from the tag's
   * top-left corner
   */
  readonly corners: readonly [Point, Point, Point, Point];
  /** Present when the detector was given camera intrinsics */
  readonly pose?: TagPose;
}

/** Intermediate counts some detectors report for diagnostics */
export interface DetectorCounters {
  readonly edges: number;
  readonly segments: number;
  readonly quads: number;
}

export interface DetectResult {
  readonly detections: readonly Detection[];
  readonly profile: TimingProfile;
  readonly counters?: DetectorCounters;
}

export interface DetectorOptions {
  readonly border: number;
  readonly threads: number;
  readonly decimate: number;
  readonly blur: number;
  readonly refineEdges: boolean;
  readonly refineDecode: boolean;
  readonly refinePose: boolean;
  readonly quadContours: boolean;
  readonly debug: boolean;
  /** Intrinsics for pose estimation; no pose without them */
  readonly camera: CameraParams | null;
  /** Tag edge length in the unit the pose translation is wanted in */
  readonly tagSize: number;
}

type Awaitable<T> = T | Promise<T>;

/**
 * Boundary to the external detection engine.
 *
 * - `configure` raises ConfigurationError for an unknown family
 * - `detect` is deterministic for identical image and configuration and
 *   must not keep a reference to the image after returning
 * - `release` is called exactly once per handle
 */
export interface DetectorAdapter<Handle = unknown> {
  readonly name: string;
  configure(family: string, options: DetectorOptions): Awaitable<Handle>;
  detect(handle: Handle, image: InputImage): Awaitable<DetectResult>;
  release(handle: Handle): Awaitable<void>;
}
