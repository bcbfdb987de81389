/**
 * Watermark compositor: resize (aspect preserved, longest side = size),
 * anchor placement with a fixed margin, and a linear alpha blend spec.
 * No pixels are touched here; ffmpeg applies the blend.
 */

import { WatermarkAssetError } from '../errors';
import {
  type BlendSpec,
  type Dimensions,
  type OverlaySpec,
  TARGET_HEIGHT,
  TARGET_WIDTH,
  type WatermarkAnchor,
  type WatermarkConfig,
  WATERMARK_MARGIN_PX,
} from '../types';

const TARGET_FRAME: Dimensions = { width: TARGET_WIDTH, height: TARGET_HEIGHT };

function fitLongestSide(asset: Dimensions, size: number): Dimensions {
  if (asset.width >= asset.height) {
    return { width: size, height: Math.max(1, Math.round((size * asset.height) / asset.width)) };
  }
  return { width: Math.max(1, Math.round((size * asset.width) / asset.height)), height: size };
}

function placeAt(anchor: WatermarkAnchor, overlay: Dimensions, frame: Dimensions): { x: number; y: number } {
  const right = frame.width - overlay.width - WATERMARK_MARGIN_PX;
  const bottom = frame.height - overlay.height - WATERMARK_MARGIN_PX;
  switch (anchor) {
    case 'bottom-right':
      return { x: right, y: bottom };
    case 'bottom-left':
      return { x: WATERMARK_MARGIN_PX, y: bottom };
    case 'top-right':
      return { x: right, y: WATERMARK_MARGIN_PX };
    case 'top-left':
      return { x: WATERMARK_MARGIN_PX, y: WATERMARK_MARGIN_PX };
  }
}

/**
 * `out = opacity * watermark + (1 - opacity) * background`, per channel.
 */
export function blendSpec(opacity: number): BlendSpec {
  return {
    mode: 'linear-alpha',
    opacity,
    watermarkWeight: opacity,
    backgroundWeight: 1 - opacity,
  };
}

export function composeWatermark(
  asset: Dimensions,
  config: WatermarkConfig,
  frame: Dimensions = TARGET_FRAME,
): OverlaySpec {
  const { width, height } = asset;
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new WatermarkAssetError(`Watermark asset ${config.assetPath} has zero area (${width}x${height})`);
  }

  const resized = fitLongestSide(asset, config.size);
  return {
    assetPath: config.assetPath,
    width: resized.width,
    height: resized.height,
    ...placeAt(config.anchor, resized, frame),
    anchor: config.anchor,
    margin: WATERMARK_MARGIN_PX,
    blend: blendSpec(config.opacity),
  };
}
