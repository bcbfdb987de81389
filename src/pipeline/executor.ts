/**
 * Job executor: runs one job's descriptor through the encoder and drives the
 * job's status machine from the process lifecycle.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  CancelledError,
  EncoderRuntimeError,
  EncoderSpawnError,
  errorMessage,
} from '../errors';
import type { ConversionJob, JobOutcome, JobSnapshot, JobStatus, TransformDescriptor } from '../types';
import type { EncoderRunner } from '../utils/ffmpeg';
import makeDebug from '../utils/debug';
import { buildFfmpegArgs } from './ffmpegArgs';
import { createProgressParser, summarizeDiagnostics } from './ffmpegOutput';
import { advanceProgress, snapshotJob, transitionJob } from './job';

const debug = makeDebug('executor');

export interface JobObserver {
  onStatus?(job: JobSnapshot): void;
  onProgress?(job: JobSnapshot): void;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  observer?: JobObserver;
}

export interface JobRunner {
  /**
   * Resolves with the terminal outcome. Rejects only with EncoderSpawnError,
   * after the job has been marked failed.
   */
  execute(job: ConversionJob, descriptor: TransformDescriptor, options?: ExecuteOptions): Promise<JobOutcome>;
}

function cancelReason(signal: AbortSignal | undefined): string | undefined {
  return typeof signal?.reason === 'string' ? signal.reason : undefined;
}

export class JobExecutor implements JobRunner {
  constructor(private readonly runner: EncoderRunner) {}

  async execute(
    job: ConversionJob,
    descriptor: TransformDescriptor,
    options: ExecuteOptions = {},
  ): Promise<JobOutcome> {
    const { signal, observer } = options;
    const settle = (status: JobStatus, error?: string): JobOutcome => {
      transitionJob(job, status, error);
      observer?.onStatus?.(snapshotJob(job));
      debug('job %s -> %s%s', job.id, status, error ? `: ${error}` : '');
      return { jobId: job.id, status, ...(error !== undefined ? { error } : {}) };
    };

    if (signal?.aborted) {
      return settle('cancelled', cancelReason(signal));
    }

    transitionJob(job, 'running');
    observer?.onStatus?.(snapshotJob(job));

    const onStderr = createProgressParser(descriptor.source.durationSec, (fraction) => {
      if (advanceProgress(job, fraction)) {
        observer?.onProgress?.(snapshotJob(job));
      }
    });

    try {
      await fs.promises.mkdir(path.dirname(descriptor.outputPath), { recursive: true });
      const exit = await this.runner.run(buildFfmpegArgs(descriptor), { signal, onStderr });
      if (exit.code === 0) {
        return settle('succeeded');
      }
      const failure = new EncoderRuntimeError(exit.code, exit.signal, summarizeDiagnostics(exit.stderr));
      return settle('failed', failure.message);
    } catch (err) {
      if (err instanceof CancelledError) {
        return settle('cancelled', cancelReason(signal));
      }
      if (err instanceof EncoderSpawnError) {
        settle('failed', err.message);
        throw err;
      }
      return settle('failed', errorMessage(err));
    }
  }
}
