import { describe, expect, it } from 'vitest';
import type { JobParameters, VideoMetadata, WatermarkConfig } from '../types';
import { buildTransformDescriptor } from './descriptor';
import { buildFfmpegArgs, buildFilterGraph, hasVisibleOverlay } from './ffmpegArgs';

const source: VideoMetadata = { width: 3840, height: 1600, durationSec: 10, aspectRatio: 2.4, hasAudio: true };

const defaultWatermark: WatermarkConfig = { assetPath: '/wm.png', opacity: 0.5, size: 200, anchor: 'bottom-right' };

function descriptorFor(quality: JobParameters['quality'], watermark?: Partial<WatermarkConfig>) {
  const job: JobParameters = {
    id: 'job-1',
    sourcePath: '/in/clip.mov',
    outputPath: '/out/vertical_clip.mov',
    zoom: 1,
    quality,
    watermark: watermark ? { ...defaultWatermark, ...watermark } : undefined,
  };
  return buildTransformDescriptor(job, { source, watermarkAsset: { width: 100, height: 50 } });
}

describe('buildFilterGraph', () => {
  it('crops and scales straight to [outv] without a watermark', () => {
    expect(buildFilterGraph(descriptorFor('high'))).toBe(
      '[0:v]crop=900:1600:1470:0,scale=1080:1920:flags=lanczos,setsar=1[outv]',
    );
  });

  it('chains the watermark resize, alpha and overlay', () => {
    expect(buildFilterGraph(descriptorFor('medium', {}))).toBe(
      '[0:v]crop=900:1600:1470:0,scale=1080:1920:flags=bicubic,setsar=1[base];' +
        '[1:v]scale=200:100:flags=bicubic,format=rgba,colorchannelmixer=aa=0.5[wm];' +
        '[base][wm]overlay=856:1796:format=auto[outv]',
    );
  });

  it('skips the alpha stage at full opacity', () => {
    expect(buildFilterGraph(descriptorFor('low', { opacity: 1 }))).toContain(
      '[1:v]scale=200:100:flags=bilinear,format=rgba[wm]',
    );
  });

  it('drops an invisible watermark entirely', () => {
    const descriptor = descriptorFor('high', { opacity: 0 });
    expect(hasVisibleOverlay(descriptor)).toBe(false);
    expect(buildFilterGraph(descriptor)).toBe(
      '[0:v]crop=900:1600:1470:0,scale=1080:1920:flags=lanczos,setsar=1[outv]',
    );
  });
});

describe('buildFfmpegArgs', () => {
  it('produces the full argv for a plain job', () => {
    expect(buildFfmpegArgs(descriptorFor('high'))).toEqual([
      '-y', '-hide_banner',
      '-i', '/in/clip.mov',
      '-filter_complex', '[0:v]crop=900:1600:1470:0,scale=1080:1920:flags=lanczos,setsar=1[outv]',
      '-map', '[outv]',
      '-map', '0:a?',
      '-c:v', 'libx264',
      '-preset', 'slow',
      '-crf', '18',
      '-maxrate', '5M',
      '-bufsize', '10M',
      '-pix_fmt', 'yuv420p',
      '-profile:v', 'high',
      '-level', '4.2',
      '-c:a', 'aac',
      '-b:a', '320k',
      '-ar', '48000',
      '-movflags', '+faststart',
      '/out/vertical_clip.mov',
    ]);
  });

  it('adds the watermark as the second input', () => {
    const args = buildFfmpegArgs(descriptorFor('low', {}));
    expect(args.slice(2, 6)).toEqual(['-i', '/in/clip.mov', '-i', '/wm.png']);
    expect(args[args.indexOf('-preset') + 1]).toBe('faster');
    expect(args[args.indexOf('-b:a') + 1]).toBe('128k');
  });

  it('omits the second input when the watermark is invisible', () => {
    const args = buildFfmpegArgs(descriptorFor('high', { opacity: 0 }));
    expect(args.filter((arg) => arg === '-i')).toHaveLength(1);
  });

  it('ends with the output path', () => {
    const args = buildFfmpegArgs(descriptorFor('medium', {}));
    expect(args[args.length - 1]).toBe('/out/vertical_clip.mov');
  });
});
