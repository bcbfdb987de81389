/**
 * ConversionJob creation (validated at the boundary) and its status machine:
 * pending -> running -> {succeeded, failed, cancelled}, plus pending ->
 * cancelled / failed for jobs that never reach the encoder.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { JobStateError, JobValidationError } from '../errors';
import {
  type ConversionJob,
  type JobSnapshot,
  type JobStatus,
  MAX_WATERMARK_SIZE,
  MAX_ZOOM,
  MIN_WATERMARK_SIZE,
  MIN_ZOOM,
  QUALITY_PRESETS,
  WATERMARK_ANCHORS,
} from '../types';

export const watermarkConfigSchema = z.object({
  assetPath: z.string().min(1),
  opacity: z.number().min(0).max(1).default(0.7),
  size: z.number().int().min(MIN_WATERMARK_SIZE).max(MAX_WATERMARK_SIZE).default(150),
  anchor: z.enum(WATERMARK_ANCHORS).default('bottom-right'),
});

export const jobParametersSchema = z.object({
  sourcePath: z.string().min(1),
  outputPath: z.string().min(1),
  zoom: z.number().min(MIN_ZOOM).max(MAX_ZOOM).default(1),
  quality: z.enum(QUALITY_PRESETS).default('high'),
  watermark: watermarkConfigSchema.optional(),
});

export type JobParametersInput = z.input<typeof jobParametersSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates free-form parameters into a pending job. Throws
 * JobValidationError listing every rejected field.
 */
export function createConversionJob(
  input: JobParametersInput | Record<string, unknown>,
  id: string = uuidv4(),
): ConversionJob {
  const parsed = jobParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new JobValidationError(formatIssues(parsed.error));
  }
  const { watermark, ...params } = parsed.data;
  return {
    id,
    ...params,
    ...(watermark ? { watermark: Object.freeze({ ...watermark }) } : {}),
    status: 'pending',
    progress: 0,
  };
}

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['running', 'cancelled', 'failed'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function transitionJob(job: ConversionJob, next: JobStatus, error?: string): void {
  if (!TRANSITIONS[job.status].includes(next)) {
    throw new JobStateError(`Job ${job.id}: illegal transition ${job.status} -> ${next}`);
  }
  job.status = next;
  if (next === 'succeeded') {
    job.progress = 1;
  }
  if (error !== undefined) {
    job.error = error;
  }
}

/**
 * Applies a progress fraction if the job is running and the value moves
 * forward. Returns whether the job changed.
 */
export function advanceProgress(job: ConversionJob, fraction: number): boolean {
  if (job.status !== 'running' || !Number.isFinite(fraction)) return false;
  const next = Math.min(1, Math.max(0, fraction));
  if (next <= job.progress) return false;
  job.progress = next;
  return true;
}

export function snapshotJob(job: ConversionJob): JobSnapshot {
  return Object.freeze({
    id: job.id,
    sourcePath: job.sourcePath,
    outputPath: job.outputPath,
    status: job.status,
    progress: job.progress,
    ...(job.error !== undefined ? { error: job.error } : {}),
  });
}
