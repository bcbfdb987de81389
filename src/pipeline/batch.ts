/**
 * Batch orchestrator: runs jobs strictly in order, one at a time, publishing
 * immutable snapshots. A failing job never stops the batch; an encoder that
 * cannot be spawned does.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { EncoderSpawnError, ProbeError, WatermarkAssetError, errorMessage } from '../errors';
import type {
  BatchFailure,
  BatchSnapshot,
  BatchState,
  BatchSummary,
  ConversionJob,
  ImageMetadata,
  JobSnapshot,
  JobStatus,
  TransformDescriptor,
} from '../types';
import makeDebug from '../utils/debug';
import type { MediaProber } from '../utils/ffprobe';
import { buildTransformDescriptor } from './descriptor';
import type { JobObserver, JobRunner } from './executor';
import { isTerminal, snapshotJob, transitionJob } from './job';

const debug = makeDebug('batch');

export interface BatchDependencies {
  executor: JobRunner;
  prober: MediaProber;
}

export interface BatchEventMap {
  'job-status': JobSnapshot;
  'job-progress': JobSnapshot;
  'batch-progress': BatchSnapshot;
  'batch-complete': BatchSummary;
}

export type BatchEventName = keyof BatchEventMap;

export class BatchOrchestrator {
  readonly id: string;
  private readonly jobs: ConversionJob[];
  private readonly controller = new AbortController();
  private readonly emitter = new EventEmitter();
  private readonly failures: BatchFailure[] = [];
  private state: BatchState = 'pending';
  private abortReason?: string;

  constructor(
    jobs: readonly ConversionJob[],
    private readonly deps: BatchDependencies,
    id: string = uuidv4(),
  ) {
    this.id = id;
    this.jobs = [...jobs];
  }

  on<K extends BatchEventName>(event: K, listener: (payload: BatchEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  private publish<K extends BatchEventName>(event: K, payload: BatchEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * One-way. Returns false when the batch was already cancelled or finished.
   * The running job, if any, is stopped through its abort signal.
   */
  cancel(reason = 'cancelled by request'): boolean {
    if (this.cancelled || this.state === 'completed') return false;
    debug('batch %s cancel: %s', this.id, reason);
    this.controller.abort(reason);
    return true;
  }

  async run(): Promise<BatchSummary> {
    if (this.state !== 'pending') {
      throw new Error(`Batch ${this.id} already started`);
    }
    this.state = 'running';
    this.publish('batch-progress', this.snapshot());

    for (let i = 0; i < this.jobs.length; i++) {
      const job = this.jobs[i];
      if (this.cancelled) {
        this.cancelPending(i, this.cancelMessage());
        break;
      }

      let fatal: EncoderSpawnError | undefined;
      try {
        await this.processJob(job);
      } catch (err) {
        if (!(err instanceof EncoderSpawnError)) throw err;
        fatal = err;
      }
      this.recordCompletion(job);

      if (fatal) {
        this.abortReason = `encoder unavailable: ${fatal.message}`;
        this.cancelPending(i + 1, this.abortReason);
        break;
      }
    }

    this.state = 'completed';
    const summary = this.summary();
    this.publish('batch-complete', summary);
    return summary;
  }

  private cancelMessage(): string {
    const reason: unknown = this.controller.signal.reason;
    return typeof reason === 'string' ? reason : 'cancelled';
  }

  private observer(): JobObserver {
    return {
      onStatus: (job) => this.publish('job-status', job),
      onProgress: (job) => this.publish('job-progress', job),
    };
  }

  private settleEarly(job: ConversionJob, status: JobStatus, error: string): void {
    transitionJob(job, status, error);
    this.publish('job-status', snapshotJob(job));
  }

  private async probeWatermark(job: ConversionJob): Promise<ImageMetadata | undefined> {
    if (!job.watermark) return undefined;
    try {
      return await this.deps.prober.probeImage(job.watermark.assetPath);
    } catch (err) {
      if (err instanceof ProbeError) {
        throw new WatermarkAssetError(
          `Cannot read watermark asset ${job.watermark.assetPath}: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  private async processJob(job: ConversionJob): Promise<void> {
    let descriptor: TransformDescriptor;
    try {
      const source = await this.deps.prober.probeVideo(job.sourcePath);
      const watermarkAsset = await this.probeWatermark(job);
      descriptor = buildTransformDescriptor(job, { source, watermarkAsset });
    } catch (err) {
      this.settleEarly(job, 'failed', errorMessage(err));
      if (err instanceof EncoderSpawnError) throw err;
      return;
    }
    await this.deps.executor.execute(job, descriptor, {
      signal: this.controller.signal,
      observer: this.observer(),
    });
  }

  private recordCompletion(job: ConversionJob): void {
    if (job.status === 'failed') {
      this.failures.push(
        Object.freeze({ jobId: job.id, sourcePath: job.sourcePath, error: job.error ?? 'Unknown error' }),
      );
    }
    this.publish('batch-progress', this.snapshot());
  }

  private cancelPending(from: number, reason: string): void {
    for (const job of this.jobs.slice(from)) {
      if (job.status === 'pending') {
        this.settleEarly(job, 'cancelled', reason);
      }
    }
    this.publish('batch-progress', this.snapshot());
  }

  snapshot(): BatchSnapshot {
    const completed = this.jobs.filter((job) => isTerminal(job.status)).length;
    const total = this.jobs.length;
    return Object.freeze({
      id: this.id,
      state: this.state,
      total,
      completed,
      progress: total === 0 ? 1 : completed / total,
      cancelled: this.cancelled,
      ...(this.abortReason !== undefined ? { abortReason: this.abortReason } : {}),
      jobs: Object.freeze(this.jobs.map(snapshotJob)),
      failures: Object.freeze([...this.failures]),
    });
  }

  summary(): BatchSummary {
    const pick = (status: JobStatus) => this.jobs.filter((job) => job.status === status);
    return Object.freeze({
      batchId: this.id,
      succeeded: pick('succeeded').map((job) => ({
        jobId: job.id,
        sourcePath: job.sourcePath,
        outputPath: job.outputPath,
      })),
      failed: [...this.failures],
      cancelled: pick('cancelled').map((job) => ({
        jobId: job.id,
        sourcePath: job.sourcePath,
        ...(job.error !== undefined ? { reason: job.error } : {}),
      })),
    });
  }
}
