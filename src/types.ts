/**
 * Shared types and constants for the vertical video converter.
 */

export const TARGET_WIDTH = 1080;
export const TARGET_HEIGHT = 1920;
export const TARGET_ASPECT = TARGET_WIDTH / TARGET_HEIGHT;

export const MIN_ZOOM = 1;
export const MAX_ZOOM = 3;
export const MIN_WATERMARK_SIZE = 50;
export const MAX_WATERMARK_SIZE = 500;
export const WATERMARK_MARGIN_PX = 24;

export const MAX_FILE_SIZE_BYTES = 200 * 1024 * 1024; // 200MB
export const SUPPORTED_VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.wmv'] as const;
export const OUTPUT_PREFIX = 'vertical_';

export interface Dimensions {
  width: number;
  height: number;
}

export interface VideoMetadata extends Dimensions {
  durationSec: number;
  aspectRatio: number;
  hasAudio: boolean;
}

export type ImageMetadata = Dimensions;

export const QUALITY_PRESETS = ['high', 'medium', 'low'] as const;
export type QualityPreset = (typeof QUALITY_PRESETS)[number];

export const WATERMARK_ANCHORS = ['bottom-right', 'bottom-left', 'top-right', 'top-left'] as const;
export type WatermarkAnchor = (typeof WATERMARK_ANCHORS)[number];

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface WatermarkConfig {
  readonly assetPath: string;
  /** 0 = invisible, 1 = fully opaque. */
  readonly opacity: number;
  /** Longest side of the resized watermark, in pixels. */
  readonly size: number;
  readonly anchor: WatermarkAnchor;
}

export interface JobParameters {
  readonly id: string;
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly zoom: number;
  readonly quality: QualityPreset;
  readonly watermark?: WatermarkConfig;
}

export interface ConversionJob extends JobParameters {
  status: JobStatus;
  progress: number;
  error?: string;
}

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScaleTarget {
  width: number;
  height: number;
  factorX: number;
  factorY: number;
}

export interface Geometry {
  crop: CropRect;
  scale: ScaleTarget;
}

export type ScaleFlags = 'lanczos' | 'bicubic' | 'bilinear';

export interface EncoderParams {
  videoCodec: 'libx264';
  speedPreset: 'slow' | 'medium' | 'faster';
  crf: number;
  maxRate: string;
  bufSize: string;
  pixelFormat: 'yuv420p';
  profile: 'high';
  level: string;
  audioCodec: 'aac';
  audioBitrate: string;
  audioSampleRate: number;
  scaleFlags: ScaleFlags;
}

export interface BlendSpec {
  mode: 'linear-alpha';
  opacity: number;
  watermarkWeight: number;
  backgroundWeight: number;
}

export interface OverlaySpec {
  assetPath: string;
  width: number;
  height: number;
  x: number;
  y: number;
  anchor: WatermarkAnchor;
  margin: number;
  blend: BlendSpec;
}

export interface TransformDescriptor {
  readonly jobId: string;
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly source: Readonly<{ width: number; height: number; durationSec: number }>;
  readonly crop: Readonly<CropRect>;
  readonly scale: Readonly<ScaleTarget>;
  readonly encoder: Readonly<EncoderParams>;
  readonly overlay?: Readonly<OverlaySpec>;
}

export interface JobSnapshot {
  readonly id: string;
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly status: JobStatus;
  readonly progress: number;
  readonly error?: string;
}

export interface JobOutcome {
  jobId: string;
  status: JobStatus;
  error?: string;
}

export interface BatchFailure {
  readonly jobId: string;
  readonly sourcePath: string;
  readonly error: string;
}

export type BatchState = 'pending' | 'running' | 'completed';

export interface BatchSnapshot {
  readonly id: string;
  readonly state: BatchState;
  readonly total: number;
  readonly completed: number;
  readonly progress: number;
  readonly cancelled: boolean;
  readonly abortReason?: string;
  readonly jobs: readonly JobSnapshot[];
  readonly failures: readonly BatchFailure[];
}

export interface BatchSummary {
  readonly batchId: string;
  readonly succeeded: readonly { jobId: string; sourcePath: string; outputPath: string }[];
  readonly failed: readonly BatchFailure[];
  readonly cancelled: readonly { jobId: string; sourcePath: string; reason?: string }[];
}
