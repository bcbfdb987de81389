/**
 * Transform descriptor builder: folds geometry, encoder preset and the
 * optional overlay into one frozen, JSON-serializable description of a job.
 */

import { DescriptorBuildError, WatermarkAssetError } from '../errors';
import type {
  ImageMetadata,
  JobParameters,
  OverlaySpec,
  TransformDescriptor,
  VideoMetadata,
} from '../types';
import { resolveGeometry } from './geometry';
import { resolvePreset } from './presets';
import { composeWatermark } from './watermark';

export interface DescriptorInputs {
  source: VideoMetadata;
  /** Probed watermark asset dimensions; required when the job has a watermark. */
  watermarkAsset?: ImageMetadata;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function resolveOverlay(job: JobParameters, inputs: DescriptorInputs): OverlaySpec | undefined {
  if (!job.watermark) return undefined;
  if (!inputs.watermarkAsset) {
    throw new WatermarkAssetError(`Watermark asset ${job.watermark.assetPath} was not read`);
  }
  return composeWatermark(inputs.watermarkAsset, job.watermark);
}

export function buildTransformDescriptor(job: JobParameters, inputs: DescriptorInputs): TransformDescriptor {
  try {
    const { crop, scale } = resolveGeometry(inputs.source, job.zoom);
    const encoder = resolvePreset(job.quality);
    const overlay = resolveOverlay(job, inputs);

    const descriptor: TransformDescriptor = {
      jobId: job.id,
      sourcePath: job.sourcePath,
      outputPath: job.outputPath,
      source: {
        width: inputs.source.width,
        height: inputs.source.height,
        durationSec: inputs.source.durationSec,
      },
      crop,
      scale,
      encoder: { ...encoder },
      ...(overlay ? { overlay } : {}),
    };
    return deepFreeze(descriptor);
  } catch (err) {
    throw new DescriptorBuildError(job.id, err);
  }
}
