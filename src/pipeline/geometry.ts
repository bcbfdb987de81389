/**
 * Geometry resolver: source dimensions + zoom -> centered 9:16 crop and the
 * scale that takes it to the 1080x1920 target frame. Never pads.
 */

import { GeometryError } from '../errors';
import {
  type Dimensions,
  type Geometry,
  MAX_ZOOM,
  MIN_ZOOM,
  TARGET_HEIGHT,
  TARGET_WIDTH,
} from '../types';

function assertSource(source: Dimensions): void {
  const { width, height } = source;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new GeometryError(`Invalid source dimensions ${width}x${height}`);
  }
}

function assertZoom(zoom: number): void {
  if (!Number.isFinite(zoom) || zoom < MIN_ZOOM || zoom > MAX_ZOOM) {
    throw new GeometryError(`Zoom ${zoom} outside [${MIN_ZOOM}, ${MAX_ZOOM}]`);
  }
}

/**
 * Largest centered 9:16 rectangle inside the source. Integer math keeps the
 * result exact: `w * 1920 > h * 1080` is `w/h > 9/16` without rounding.
 */
function aspectCrop(source: Dimensions): Dimensions {
  const { width, height } = source;
  if (width * TARGET_HEIGHT > height * TARGET_WIDTH) {
    return { width: Math.floor((height * TARGET_WIDTH) / TARGET_HEIGHT), height };
  }
  return { width, height: Math.floor((width * TARGET_HEIGHT) / TARGET_WIDTH) };
}

export function resolveGeometry(source: Dimensions, zoom: number): Geometry {
  assertSource(source);
  assertZoom(zoom);

  const base = aspectCrop(source);
  const width = Math.min(source.width, Math.floor(base.width / zoom));
  const height = Math.min(source.height, Math.floor(base.height / zoom));
  if (width < 1 || height < 1) {
    throw new GeometryError(
      `Crop degenerates to ${width}x${height} for source ${source.width}x${source.height} at zoom ${zoom}`,
    );
  }

  return {
    crop: {
      x: Math.floor((source.width - width) / 2),
      y: Math.floor((source.height - height) / 2),
      width,
      height,
    },
    scale: {
      width: TARGET_WIDTH,
      height: TARGET_HEIGHT,
      factorX: TARGET_WIDTH / width,
      factorY: TARGET_HEIGHT / height,
    },
  };
}
