/**
 * In-memory registry of batches. Each batch runs as a detached task; callers
 * only read snapshots or request cancellation.
 */

import { errorMessage } from '../errors';
import { BatchOrchestrator, type BatchDependencies } from '../pipeline/batch';
import type { BatchSnapshot, BatchSummary, ConversionJob } from '../types';
import { rmDirRecursive } from '../utils/tmp';

export interface BatchRecord {
  readonly orchestrator: BatchOrchestrator;
  readonly createdAt: number;
  /** Upload directory owned by this batch, removed once it is no longer needed. */
  readonly tmpDir?: string;
  done: Promise<BatchSummary | undefined>;
}

export interface RegistryOptions {
  /** 0 = no deadline. */
  batchTimeoutSec: number;
  /** How long a finished batch stays listed before it and its upload directory are dropped. 0 = forever. */
  retentionSec?: number;
}

export class BatchRegistry {
  private readonly batches = new Map<string, BatchRecord>();

  constructor(
    private readonly deps: BatchDependencies,
    private readonly options: RegistryOptions,
  ) {}

  start(jobs: readonly ConversionJob[], tmpDir?: string): BatchRecord {
    const orchestrator = new BatchOrchestrator(jobs, this.deps);
    const record: BatchRecord = {
      orchestrator,
      createdAt: Date.now(),
      ...(tmpDir !== undefined ? { tmpDir } : {}),
      done: Promise.resolve(undefined),
    };
    this.batches.set(orchestrator.id, record);
    record.done = this.drive(record);
    return record;
  }

  private async drive(record: BatchRecord): Promise<BatchSummary | undefined> {
    const { orchestrator } = record;
    const start = Date.now();
    const { batchTimeoutSec } = this.options;
    const timer = batchTimeoutSec > 0
      ? setTimeout(() => {
        orchestrator.cancel(`batch timeout after ${batchTimeoutSec}s`);
      }, batchTimeoutSec * 1000)
      : undefined;

    try {
      const summary = await orchestrator.run();
      console.log(
        `[${orchestrator.id}] batch | ${orchestrator.snapshot().total} jobs | ` +
          `succeeded=${summary.succeeded.length} failed=${summary.failed.length} ` +
          `cancelled=${summary.cancelled.length} | ${Date.now() - start}ms`,
      );
      if (record.tmpDir && summary.succeeded.length === 0) {
        this.releaseTmpDir(record);
      }
      return summary;
    } catch (err) {
      console.error(`[${orchestrator.id}] batch crashed:`, errorMessage(err));
      if (record.tmpDir) this.releaseTmpDir(record);
      return undefined;
    } finally {
      if (timer) clearTimeout(timer);
      this.scheduleEviction(record);
    }
  }

  private scheduleEviction(record: BatchRecord): void {
    const retentionSec = this.options.retentionSec ?? 0;
    if (retentionSec <= 0) return;
    setTimeout(() => this.evict(record.orchestrator.id), retentionSec * 1000).unref();
  }

  /** Forgets a batch and removes its upload directory, if any. */
  evict(id: string): boolean {
    const record = this.batches.get(id);
    if (!record) return false;
    this.batches.delete(id);
    this.releaseTmpDir(record);
    return true;
  }

  releaseTmpDir(record: BatchRecord): void {
    if (!record.tmpDir) return;
    try {
      rmDirRecursive(record.tmpDir);
    } catch (err) {
      console.error(`[${record.orchestrator.id}] tmp cleanup failed:`, errorMessage(err));
    }
  }

  get(id: string): BatchRecord | undefined {
    return this.batches.get(id);
  }

  list(): BatchSnapshot[] {
    return [...this.batches.values()]
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((record) => record.orchestrator.snapshot());
  }

  cancel(id: string): BatchSnapshot | undefined {
    const record = this.batches.get(id);
    if (!record) return undefined;
    record.orchestrator.cancel();
    return record.orchestrator.snapshot();
  }
}
