import { describe, expect, it } from 'vitest';
import { DescriptorBuildError, GeometryError, WatermarkAssetError } from '../errors';
import type { JobParameters, VideoMetadata } from '../types';
import { buildTransformDescriptor } from './descriptor';

const source: VideoMetadata = { width: 3840, height: 1600, durationSec: 12.5, aspectRatio: 2.4, hasAudio: true };

function params(overrides: Partial<JobParameters> = {}): JobParameters {
  return {
    id: 'job-1',
    sourcePath: '/in/clip.mp4',
    outputPath: '/out/vertical_clip.mp4',
    zoom: 1,
    quality: 'high',
    ...overrides,
  };
}

describe('buildTransformDescriptor', () => {
  it('folds geometry and encoder params for a job without watermark', () => {
    const descriptor = buildTransformDescriptor(params(), { source });
    expect(descriptor.jobId).toBe('job-1');
    expect(descriptor.source).toEqual({ width: 3840, height: 1600, durationSec: 12.5 });
    expect(descriptor.crop).toEqual({ x: 1470, y: 0, width: 900, height: 1600 });
    expect(descriptor.scale).toEqual({ width: 1080, height: 1920, factorX: 1.2, factorY: 1.2 });
    expect(descriptor.encoder.crf).toBe(18);
    expect(descriptor).not.toHaveProperty('overlay');
  });

  it('adds the composed overlay when a watermark is configured', () => {
    const descriptor = buildTransformDescriptor(
      params({ watermark: { assetPath: '/wm.png', opacity: 0.5, size: 200, anchor: 'top-left' } }),
      { source, watermarkAsset: { width: 100, height: 50 } },
    );
    expect(descriptor.overlay).toMatchObject({ width: 200, height: 100, x: 24, y: 24, anchor: 'top-left' });
  });

  it('is deeply frozen and serializable', () => {
    const descriptor = buildTransformDescriptor(
      params({ watermark: { assetPath: '/wm.png', opacity: 0.5, size: 200, anchor: 'top-left' } }),
      { source, watermarkAsset: { width: 100, height: 50 } },
    );
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.crop)).toBe(true);
    expect(Object.isFrozen(descriptor.overlay?.blend)).toBe(true);
    expect(JSON.parse(JSON.stringify(descriptor))).toEqual(descriptor);
  });

  it('is deterministic for the same inputs', () => {
    expect(buildTransformDescriptor(params(), { source })).toEqual(buildTransformDescriptor(params(), { source }));
  });

  it('wraps geometry failures with the job id', () => {
    let caught: unknown;
    try {
      buildTransformDescriptor(params(), { source: { ...source, width: 0 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DescriptorBuildError);
    if (!(caught instanceof DescriptorBuildError)) return;
    expect(caught.jobId).toBe('job-1');
    expect(caught.cause).toBeInstanceOf(GeometryError);
    expect(caught.message).toBe('Job job-1: Invalid source dimensions 0x1600');
  });

  it('fails when the watermark asset was not read', () => {
    let caught: unknown;
    try {
      buildTransformDescriptor(
        params({ watermark: { assetPath: '/wm.png', opacity: 0.5, size: 200, anchor: 'top-left' } }),
        { source },
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DescriptorBuildError);
    if (!(caught instanceof DescriptorBuildError)) return;
    expect(caught.cause).toBeInstanceOf(WatermarkAssetError);
    expect(caught.message).toBe('Job job-1: Watermark asset /wm.png was not read');
  });
});
