/**
 * FFprobe wrapper: read video and image metadata via spawn, no shell.
 */

import { spawn } from 'child_process';
import { EncoderSpawnError, ProbeError, errorMessage } from '../errors';
import type { ImageMetadata, VideoMetadata } from '../types';
import makeDebug from './debug';

const debug = makeDebug('ffprobe');

interface FFprobeStream {
  codec_type?: string;
  width?: number;
  height?: number;
  duration?: string;
}

interface FFprobeFormat {
  duration?: string;
}

interface FFprobeOutput {
  streams?: FFprobeStream[];
  format?: FFprobeFormat;
}

export interface MediaProber {
  probeVideo(filePath: string): Promise<VideoMetadata>;
  probeImage(filePath: string): Promise<ImageMetadata>;
}

function parseJson(stdout: string): FFprobeOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    throw new ProbeError(`ffprobe: failed to parse JSON: ${errorMessage(e)}`);
  }
  if (parsed === null || typeof parsed !== 'object') {
    throw new ProbeError('ffprobe: output is not a JSON object');
  }
  return parsed;
}

function parseSeconds(raw?: string): number {
  if (!raw) return 0;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/**
 * Picks the first video stream. Duration comes from the stream, falling back
 * to the container.
 */
export function parseVideoProbe(stdout: string): VideoMetadata {
  const json = parseJson(stdout);
  const streams = json.streams ?? [];
  const format = json.format ?? {};

  const video = streams.find((s) => s.codec_type === 'video');
  const width = video?.width ?? 0;
  const height = video?.height ?? 0;
  if (!width || !height) {
    throw new ProbeError('ffprobe: no video stream or missing width/height');
  }

  const durationSec = parseSeconds(video?.duration) || parseSeconds(format.duration);
  return {
    width,
    height,
    durationSec,
    aspectRatio: width / height,
    hasAudio: streams.some((s) => s.codec_type === 'audio'),
  };
}

/** Still images are reported by ffprobe as a single video stream. */
export function parseImageProbe(stdout: string): ImageMetadata {
  const json = parseJson(stdout);
  const stream = (json.streams ?? []).find((s) => s.codec_type === 'video');
  return { width: stream?.width ?? 0, height: stream?.height ?? 0 };
}

function runFfprobe(binary: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    debug('spawn %s %o', binary, args);
    const proc = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let settled = false;

    proc.stdout?.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
    proc.stderr?.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });

    proc.on('error', (err) => {
      if (settled) return;
      settled = true;
      reject(new EncoderSpawnError(binary, err.message));
    });

    proc.on('close', (code) => {
      if (settled) return;
      settled = true;
      if (code !== 0) {
        reject(new ProbeError(`ffprobe exited with code ${code}. stderr: ${stderr.trim().slice(-2000)}`));
        return;
      }
      resolve(stdout);
    });
  });
}

export function createProber(binary: string): MediaProber {
  return {
    async probeVideo(filePath) {
      const stdout = await runFfprobe(binary, [
        '-v', 'error',
        '-show_entries', 'stream=width,height,duration,codec_type',
        '-show_entries', 'format=duration',
        '-of', 'json',
        '-i', filePath,
      ]);
      return parseVideoProbe(stdout);
    },
    async probeImage(filePath) {
      const stdout = await runFfprobe(binary, [
        '-v', 'error',
        '-select_streams', 'v:0',
        '-show_entries', 'stream=width,height,codec_type',
        '-of', 'json',
        '-i', filePath,
      ]);
      return parseImageProbe(stdout);
    },
  };
}
