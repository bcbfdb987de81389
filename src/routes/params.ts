/**
 * Request parameters shared by the batch, convert and inspect routes.
 * Loosely typed input is normalized here; range checks happen when the job
 * is created.
 */

import { z } from 'zod';
import type { AppConfig } from '../config';

/** Blank form fields and nulls count as absent, not as 0. */
const optionalNumber = () =>
  z.preprocess(
    (value) => (value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value),
    z.coerce.number().optional(),
  );

const watermarkRequestSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).optional(),
  opacity: optionalNumber(),
  size: optionalNumber(),
  anchor: z.string().optional(),
});

export const conversionParamsSchema = z.object({
  quality: z.string().trim().toLowerCase().optional(),
  zoom: optionalNumber(),
  watermark: watermarkRequestSchema.optional(),
});

export type ConversionParams = z.infer<typeof conversionParamsSchema>;

export const batchRequestSchema = conversionParamsSchema.extend({
  source: z.string().min(1),
  outputDir: z.string().min(1),
});

export const inspectRequestSchema = conversionParamsSchema.extend({
  source: z.string().min(1),
  outputDir: z.string().min(1).optional(),
});

/**
 * Multipart forms carry flat string fields:
 * quality, zoom, watermark ("true"/"false"), watermarkOpacity, watermarkSize,
 * watermarkAnchor.
 */
export function paramsFromForm(fields: Record<string, unknown>): ConversionParams {
  const flag = fields.watermark;
  const watermarkOn = flag === true || flag === 'true';
  return conversionParamsSchema.parse({
    quality: fields.quality,
    zoom: fields.zoom,
    ...(watermarkOn
      ? {
        watermark: {
          enabled: true,
          opacity: fields.watermarkOpacity,
          size: fields.watermarkSize,
          anchor: fields.watermarkAnchor,
        },
      }
      : {}),
  });
}

/**
 * Raw input for createConversionJob. A watermark switched on without a path
 * uses the bundled default asset.
 */
export function toJobInput(
  sourcePath: string,
  outputPath: string,
  params: ConversionParams,
  config: AppConfig,
): Record<string, unknown> {
  const wm = params.watermark;
  return {
    sourcePath,
    outputPath,
    quality: params.quality,
    zoom: params.zoom,
    ...(wm && wm.enabled
      ? {
        watermark: {
          assetPath: wm.path ?? config.defaultWatermarkPath,
          opacity: wm.opacity,
          size: wm.size,
          anchor: wm.anchor,
        },
      }
      : {}),
  };
}
