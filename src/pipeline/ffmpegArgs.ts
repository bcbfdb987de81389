/**
 * ffmpeg argv from a TransformDescriptor. Pure: same descriptor, same argv.
 * H.264 + AAC, mp4 output.
 */

import type { TransformDescriptor } from '../types';

/** An overlay at zero opacity leaves the background untouched, so it is dropped. */
export function hasVisibleOverlay(descriptor: TransformDescriptor): boolean {
  return descriptor.overlay !== undefined && descriptor.overlay.blend.watermarkWeight > 0;
}

/**
 * [0:v] crop -> scale to target -> [base]; optional [1:v] resize + alpha ->
 * [wm]; [base][wm] overlay. Output label is always [outv].
 */
export function buildFilterGraph(descriptor: TransformDescriptor): string {
  const { crop, scale, encoder, overlay } = descriptor;
  const flags = encoder.scaleFlags;
  const base =
    `[0:v]crop=${crop.width}:${crop.height}:${crop.x}:${crop.y},` +
    `scale=${scale.width}:${scale.height}:flags=${flags},setsar=1`;

  if (!overlay || !hasVisibleOverlay(descriptor)) {
    return `${base}[outv]`;
  }

  const alpha = overlay.blend.opacity < 1 ? `,colorchannelmixer=aa=${overlay.blend.opacity}` : '';
  return [
    `${base}[base]`,
    `[1:v]scale=${overlay.width}:${overlay.height}:flags=${flags},format=rgba${alpha}[wm]`,
    `[base][wm]overlay=${overlay.x}:${overlay.y}:format=auto[outv]`,
  ].join(';');
}

export function buildEncoderArgs(descriptor: TransformDescriptor): string[] {
  const e = descriptor.encoder;
  return [
    '-c:v', e.videoCodec,
    '-preset', e.speedPreset,
    '-crf', String(e.crf),
    '-maxrate', e.maxRate,
    '-bufsize', e.bufSize,
    '-pix_fmt', e.pixelFormat,
    '-profile:v', e.profile,
    '-level', e.level,
    '-c:a', e.audioCodec,
    '-b:a', e.audioBitrate,
    '-ar', String(e.audioSampleRate),
  ];
}

export function buildFfmpegArgs(descriptor: TransformDescriptor): string[] {
  const inputs = ['-i', descriptor.sourcePath];
  if (descriptor.overlay && hasVisibleOverlay(descriptor)) {
    inputs.push('-i', descriptor.overlay.assetPath);
  }
  return [
    '-y', '-hide_banner',
    ...inputs,
    '-filter_complex', buildFilterGraph(descriptor),
    '-map', '[outv]',
    '-map', '0:a?',
    ...buildEncoderArgs(descriptor),
    '-movflags', '+faststart',
    descriptor.outputPath,
  ];
}
