import type { Point } from '../detector/types.js';

/** Pinhole intrinsics in pixels */
export interface CameraParams {
  readonly fx: number;
  readonly fy: number;
  readonly cx: number;
  readonly cy: number;
}

export type Vec3 = readonly [number, number, number];

/** Row-major 3x3 matrix */
export type Mat3 = readonly [Vec3, Vec3, Vec3];

/**
 * Tag pose in the camera frame (x right, y down, z forward): a tag-frame
 * point `p` sits at `rotation · p + translation`. The tag frame has its
 * origin at the tag centre, x towards the right edge, y towards the bottom
 * edge, and the tag in the z = 0 plane.
 */
export interface TagPose {
  readonly rotation: Mat3;
  readonly translation: Vec3;
  /** Mean squared corner reprojection error in pixels² */
  readonly error: number;
}

// Tag corners in half-size units, in detection corner order
const TAG_CORNERS: readonly (readonly [number, number])[] = [
  [-1, -1],
  [1, -1],
  [1, 1],
  [-1, 1],
];

const POLAR_ITERATIONS = 20;

/**
 * Homography taking tag-plane coordinates (±1, ±1) to the four image
 * corners, normalised so that the bottom-right entry is 1. Null for a
 * degenerate quadrilateral.
 */
export function homographyFromCorners(
  corners: readonly [Point, Point, Point, Point]
): Mat3 | null {
  const rows: number[][] = [];
  corners.forEach((corner, index) => {
    const [u, v] = TAG_CORNERS[index] ?? [0, 0];
    const { x, y } = corner;
    rows.push([u, v, 1, 0, 0, 0, -u * x, -v * x, x]);
    rows.push([0, 0, 0, u, v, 1, -u * y, -v * y, y]);
  });

  const h = solveAugmented(rows);
  if (!h) return null;
  const [h0, h1, h2, h3, h4, h5, h6, h7] = h;
  if (
    h0 === undefined ||
    h1 === undefined ||
    h2 === undefined ||
    h3 === undefined ||
    h4 === undefined ||
    h5 === undefined ||
    h6 === undefined ||
    h7 === undefined
  ) {
    return null;
  }
  return [
    [h0, h1, h2],
    [h3, h4, h5],
    [h6, h7, 1],
  ];
}

/**
 * Pose of a square tag of edge `tagSize` from its image corners. The
 * homography columns, taken back through the intrinsics, give the first
 * two rotation axes and the translation up to scale; the rotation is then
 * snapped to the nearest orthonormal matrix.
 */
export function estimateTagPose(
  corners: readonly [Point, Point, Point, Point],
  camera: CameraParams,
  tagSize: number
): TagPose | null {
  const homography = homographyFromCorners(corners);
  if (!homography) return null;

  const column = (j: 0 | 1 | 2): Vec3 => {
    const [r0, r1, r2] = homography;
    return [
      (r0[j] - camera.cx * r2[j]) / camera.fx,
      (r1[j] - camera.cy * r2[j]) / camera.fy,
      r2[j],
    ];
  };
  const m0 = column(0);
  const m1 = column(1);
  const m2 = column(2);

  const norms = Math.sqrt(norm(m0) * norm(m1));
  if (!(norms > 0)) return null;
  let k = 1 / norms;
  // The tag lies in front of the camera
  if (m2[2] * k < 0) k = -k;

  const r0 = scale(m0, k);
  const r1 = scale(m1, k);
  const r2 = cross(r0, r1);
  const rotation = nearestRotation([
    [r0[0], r1[0], r2[0]],
    [r0[1], r1[1], r2[1]],
    [r0[2], r1[2], r2[2]],
  ]);
  const translation = scale(m2, (k * tagSize) / 2);

  const error = reprojectionError(
    corners,
    { rotation, translation },
    camera,
    tagSize
  );
  return { rotation, translation, error };
}

/** Image position of a tag-frame point; null when it is not in front */
export function projectPoint(
  point: Vec3,
  pose: Pick<TagPose, 'rotation' | 'translation'>,
  camera: CameraParams
): Point | null {
  const [x, y, z] = add(multiply(pose.rotation, point), pose.translation);
  if (!(z > 1e-9)) return null;
  return {
    x: (camera.fx * x) / z + camera.cx,
    y: (camera.fy * y) / z + camera.cy,
  };
}

function reprojectionError(
  corners: readonly Point[],
  pose: Pick<TagPose, 'rotation' | 'translation'>,
  camera: CameraParams,
  tagSize: number
): number {
  let sum = 0;
  corners.forEach((corner, index) => {
    const [u, v] = TAG_CORNERS[index] ?? [0, 0];
    const projected = projectPoint(
      [(u * tagSize) / 2, (v * tagSize) / 2, 0],
      pose,
      camera
    );
    if (!projected) {
      sum += Number.POSITIVE_INFINITY;
      return;
    }
    sum += (projected.x - corner.x) ** 2 + (projected.y - corner.y) ** 2;
  });
  return sum / corners.length;
}

/** Gauss-Jordan elimination with partial pivoting on an n×(n+1) system */
function solveAugmented(rows: number[][]): number[] | null {
  const n = rows.length;
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      const candidate = Math.abs(rows[r]?.[col] ?? 0);
      if (candidate > Math.abs(rows[pivot]?.[col] ?? 0)) pivot = r;
    }
    const pivotRow = rows[pivot];
    const current = rows[col];
    if (!pivotRow || !current) return null;
    const pivotValue = pivotRow[col] ?? 0;
    if (Math.abs(pivotValue) < 1e-12) return null;
    rows[pivot] = current;
    rows[col] = pivotRow;

    for (let r = 0; r < n; r++) {
      const row = rows[r];
      if (r === col || !row) continue;
      const factor = (row[col] ?? 0) / pivotValue;
      if (factor === 0) continue;
      for (let c = col; c <= n; c++) {
        row[c] = (row[c] ?? 0) - factor * (pivotRow[c] ?? 0);
      }
    }
  }
  return rows.map((row, i) => (row[n] ?? 0) / (row[i] ?? 1));
}

/** Polar factor by Newton iteration: R ← (R + R⁻ᵀ) / 2 */
function nearestRotation(m: Mat3): Mat3 {
  let current = m;
  for (let i = 0; i < POLAR_ITERATIONS; i++) {
    const [a, b, c] = current;
    const det = dot(a, cross(b, c));
    if (Math.abs(det) < 1e-12) return current;
    const inverseTranspose: Mat3 = [
      scale(cross(b, c), 1 / det),
      scale(cross(c, a), 1 / det),
      scale(cross(a, b), 1 / det),
    ];
    current = [
      scale(add(a, inverseTranspose[0]), 0.5),
      scale(add(b, inverseTranspose[1]), 0.5),
      scale(add(c, inverseTranspose[2]), 0.5),
    ];
  }
  return current;
}

function multiply(m: Mat3, v: Vec3): Vec3 {
  return [dot(m[0], v), dot(m[1], v), dot(m[2], v)];
}

function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

function scale(v: Vec3, k: number): Vec3 {
  return [v[0] * k, v[1] * k, v[2] * k];
}

function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

function norm(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}
