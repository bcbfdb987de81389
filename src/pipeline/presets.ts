/**
 * Quality preset -> x264/AAC encoder parameters.
 */

import { UnknownPresetError } from '../errors';
import type { EncoderParams, QualityPreset } from '../types';

type PresetTuning = Pick<EncoderParams, 'speedPreset' | 'crf' | 'maxRate' | 'audioBitrate' | 'scaleFlags'>;

const TUNING: Readonly<Record<QualityPreset, PresetTuning>> = {
  high: { speedPreset: 'slow', crf: 18, maxRate: '5M', audioBitrate: '320k', scaleFlags: 'lanczos' },
  medium: { speedPreset: 'medium', crf: 23, maxRate: '2M', audioBitrate: '192k', scaleFlags: 'bicubic' },
  low: { speedPreset: 'faster', crf: 28, maxRate: '1M', audioBitrate: '128k', scaleFlags: 'bilinear' },
};

export function isQualityPreset(value: string): value is QualityPreset {
  return Object.hasOwn(TUNING, value);
}

export function resolvePreset(preset: string): EncoderParams {
  if (!isQualityPreset(preset)) {
    throw new UnknownPresetError(preset);
  }
  const tuning = TUNING[preset];
  return Object.freeze({
    videoCodec: 'libx264',
    speedPreset: tuning.speedPreset,
    crf: tuning.crf,
    maxRate: tuning.maxRate,
    bufSize: '10M',
    pixelFormat: 'yuv420p',
    profile: 'high',
    level: '4.2',
    audioCodec: 'aac',
    audioBitrate: tuning.audioBitrate,
    audioSampleRate: 48000,
    scaleFlags: tuning.scaleFlags,
  });
}
