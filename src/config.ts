/**
 * Runtime configuration from environment variables. Out-of-range numbers
 * fall back to defaults or are clamped, never rejected.
 */

import * as os from 'os';
import * as path from 'path';

export interface AppConfig {
  port: number;
  ffmpegPath: string;
  ffprobePath: string;
  defaultWatermarkPath: string;
  /** 0 disables the batch deadline. */
  batchTimeoutSec: number;
  /** Finished batches are forgotten, and their uploads removed, after this long. */
  batchRetentionSec: number;
  tmpRoot: string;
}

const MIN_BATCH_TIMEOUT_SEC = 60;
const MAX_BATCH_TIMEOUT_SEC = 24 * 3600;
const DEFAULT_BATCH_RETENTION_SEC = 3600;
const MIN_BATCH_RETENTION_SEC = 60;
const MAX_BATCH_RETENTION_SEC = 24 * 3600;

/** Bundled watermark at the package root, whatever the working directory. */
const BUNDLED_WATERMARK_PATH = path.resolve(__dirname, '..', 'assets', 'default_watermark.png');

function readString(raw: string | undefined, fallback: string): string {
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function readPort(raw: string | undefined): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 && n < 65536 ? n : 3000;
}

function readBatchTimeoutSec(raw: string | undefined): number {
  if (raw === undefined || raw === '') return 0;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.min(Math.max(n, MIN_BATCH_TIMEOUT_SEC), MAX_BATCH_TIMEOUT_SEC);
}

function readBatchRetentionSec(raw: string | undefined): number {
  const n = parseInt(raw ?? '', 10);
  if (!Number.isFinite(n) || n <= 0) return DEFAULT_BATCH_RETENTION_SEC;
  return Math.min(Math.max(n, MIN_BATCH_RETENTION_SEC), MAX_BATCH_RETENTION_SEC);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPort(env.PORT),
    ffmpegPath: readString(env.FFMPEG_PATH, 'ffmpeg'),
    ffprobePath: readString(env.FFPROBE_PATH, 'ffprobe'),
    defaultWatermarkPath: path.resolve(readString(env.DEFAULT_WATERMARK_PATH, BUNDLED_WATERMARK_PATH)),
    batchTimeoutSec: readBatchTimeoutSec(env.BATCH_TIMEOUT_SEC),
    batchRetentionSec: readBatchRetentionSec(env.BATCH_RETENTION_SEC),
    tmpRoot: path.resolve(readString(env.TMP_ROOT, path.join(os.tmpdir(), 'vertical-converter'))),
  };
}
