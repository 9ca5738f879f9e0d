import type { Detection } from '../detector/types.js';
import {
  createRaster,
  sameLayout,
  type Raster,
  type RasterLayout,
} from '../image/raster.js';
import {
  projectPoint,
  type CameraParams,
  type TagPose,
  type Vec3,
} from '../pose/tag-pose.js';
import { HarnessError } from '../types/errors.js';
import {
  drawLine,
  drawPolygon,
  drawText,
  pixelValue,
  type PixelValue,
  type Rgb,
} from './draw.js';

export interface StrokeStyle {
  rgb: Rgb;
  gray: number;
}

export interface OverlayStyle {
  boundary: StrokeStyle;
  label: StrokeStyle;
  poseBox: StrokeStyle;
  /** x, y and z axis colours */
  axes: readonly [StrokeStyle, StrokeStyle, StrokeStyle];
}

export const DEFAULT_OVERLAY_STYLE: OverlayStyle = {
  boundary: { rgb: [0, 255, 0], gray: 255 },
  label: { rgb: [255, 255, 0], gray: 255 },
  poseBox: { rgb: [0, 255, 0], gray: 255 },
  axes: [
    { rgb: [255, 0, 0], gray: 255 },
    { rgb: [0, 255, 0], gray: 255 },
    { rgb: [0, 0, 255], gray: 255 },
  ],
};

export interface OverlayOptions {
  style?: OverlayStyle;
  /** Detections carrying a pose get a box and axes when this is set */
  camera?: CameraParams;
  /** Tag edge length the poses were estimated with (default: 1) */
  tagSize?: number;
}

// Unit cube over the tag, extruded towards the camera, and its edges
const BOX_CORNERS: readonly Vec3[] = [
  [-1, -1, 0],
  [1, -1, 0],
  [1, 1, 0],
  [-1, 1, 0],
  [-1, -1, -2],
  [1, -1, -2],
  [1, 1, -2],
  [-1, 1, -2],
];
const BOX_EDGES: readonly (readonly [number, number])[] = [
  [0, 1],
  [1, 2],
  [2, 3],
  [3, 0],
  [0, 4],
  [1, 5],
  [2, 6],
  [3, 7],
  [4, 5],
  [5, 6],
  [6, 7],
  [7, 4],
];
const AXES: readonly Vec3[] = [
  [1, 0, 0],
  [0, -1, 0],
  [0, 0, -1],
];

/** Label cell size in pixels for a tag whose first edge is `side` long */
export function labelScale(side: number): number {
  return Math.max(1, Math.floor(side / 16));
}

/**
 * Draw every detection's boundary and id on a black raster with the same
 * layout as the source image, plus a pose box and axes for posed
 * detections when the camera is known. The source is never touched.
 */
export function renderOverlay(
  layout: RasterLayout,
  detections: readonly Detection[],
  options: OverlayOptions = {}
): Raster {
  const style = options.style ?? DEFAULT_OVERLAY_STYLE;
  const overlay = createRaster(layout);
  const paint = (stroke: StrokeStyle): PixelValue =>
    pixelValue(layout.channels, stroke.rgb, stroke.gray);
  const boundary = paint(style.boundary);
  const label = paint(style.label);

  for (const det of detections) {
    drawPolygon(overlay, det.corners, boundary);
    if (det.pose && options.camera) {
      drawPose(overlay, det, det.pose, options.camera, options.tagSize ?? 1, {
        box: paint(style.poseBox),
        axes: style.axes.map(paint),
      });
    }
    const [p0, p1] = det.corners;
    const side = Math.hypot(p1.x - p0.x, p1.y - p0.y);
    drawText(overlay, String(det.id), det.center, labelScale(side), label);
  }
  return overlay;
}

function drawPose(
  raster: Raster,
  det: Detection,
  pose: TagPose,
  camera: CameraParams,
  tagSize: number,
  colors: { box: PixelValue; axes: readonly PixelValue[] }
): void {
  const half = tagSize / 2;
  const box = BOX_CORNERS.map(([x, y, z]) =>
    projectPoint([x * half, y * half, z * half], pose, camera)
  );
  for (const [i, j] of BOX_EDGES) {
    const from = box[i];
    const to = box[j];
    if (from && to) drawLine(raster, from, to, colors.box);
  }

  AXES.forEach(([x, y, z], axis) => {
    const tip = projectPoint(
      [x * tagSize, y * tagSize, z * tagSize],
      pose,
      camera
    );
    const color = colors.axes[axis];
    if (tip && color) drawLine(raster, det.center, tip, color);
  });
}

/**
 * Linear 50/50 blend of two rasters with identical layout, rounded to the
 * nearest sample value. Alpha samples are blended like any other channel.
 */
export function blendRasters(overlay: Raster, original: Raster): Raster {
  if (!sameLayout(overlay, original)) {
    throw new HarnessError({
      message:
        `Overlay layout ${overlay.width}x${overlay.height}x${overlay.channels} ` +
        `does not match image ${original.width}x${original.height}x${original.channels}`,
    });
  }
  const blended = createRaster(original);
  for (let i = 0; i < blended.data.length; i++) {
    blended.data[i] = Math.round(
      0.5 * (overlay.data[i] ?? 0) + 0.5 * (original.data[i] ?? 0)
    );
  }
  return blended;
}

/** Overlay plus blend, the form handed to a display */
export function composeOverlay(
  original: Raster,
  detections: readonly Detection[],
  options?: OverlayOptions
): Raster {
  return blendRasters(renderOverlay(original, detections, options), original);
}
