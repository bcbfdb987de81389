import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancelledError, EncoderSpawnError, ProbeError } from '../errors';
import type { ConversionJob, VideoMetadata } from '../types';
import type { EncoderExit, EncoderRunOptions, EncoderRunner } from '../utils/ffmpeg';
import type { MediaProber } from '../utils/ffprobe';
import { BatchOrchestrator } from './batch';
import { JobExecutor } from './executor';
import { createConversionJob } from './job';

const landscape: VideoMetadata = { width: 1920, height: 1080, durationSec: 4, aspectRatio: 16 / 9, hasAudio: true };
const ok: EncoderExit = { code: 0, signal: null, stderr: '' };

function fakeProber(overrides: Partial<MediaProber> = {}): MediaProber {
  return {
    probeVideo: async () => landscape,
    probeImage: async () => ({ width: 100, height: 50 }),
    ...overrides,
  };
}

function fakeRunner(impl: (args: readonly string[], options: EncoderRunOptions) => Promise<EncoderExit>) {
  const outputs: string[] = [];
  const runner: EncoderRunner = {
    run(args, options = {}) {
      outputs.push(path.basename(args[args.length - 1]));
      return impl(args, options);
    },
  };
  return { runner, outputs };
}

/** Settles only when the signal aborts, like a long encode being stopped. */
function untilAborted(signal: AbortSignal | undefined): Promise<EncoderExit> {
  return new Promise((_resolve, reject) => {
    const stop = () => reject(new CancelledError(typeof signal?.reason === 'string' ? signal.reason : 'cancelled'));
    if (signal?.aborted) {
      stop();
      return;
    }
    signal?.addEventListener('abort', stop, { once: true });
  });
}

describe('BatchOrchestrator', () => {
  let dir: string;

  const jobsFor = (...names: string[]): ConversionJob[] =>
    names.map((name) =>
      createConversionJob(
        { sourcePath: `/in/${name}.mp4`, outputPath: path.join(dir, `vertical_${name}.mp4`) },
        name,
      ),
    );

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'batch-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs jobs in order and keeps going past a failed one', async () => {
    const { runner, outputs } = fakeRunner(async (args) =>
      args[args.length - 1].endsWith('vertical_b.mp4')
        ? { code: 1, signal: null, stderr: 'Error while decoding stream #0:0\n' }
        : ok,
    );
    const batch = new BatchOrchestrator(jobsFor('a', 'b', 'c', 'd'), {
      executor: new JobExecutor(runner),
      prober: fakeProber(),
    });
    const progress: number[] = [];
    batch.on('batch-progress', (s) => progress.push(s.progress));

    const summary = await batch.run();

    expect(outputs).toEqual(['vertical_a.mp4', 'vertical_b.mp4', 'vertical_c.mp4', 'vertical_d.mp4']);
    expect(progress).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(summary.succeeded.map((s) => s.jobId)).toEqual(['a', 'c', 'd']);
    expect(summary.failed).toEqual([
      { jobId: 'b', sourcePath: '/in/b.mp4', error: 'ffmpeg exited with code 1. Error while decoding stream #0:0' },
    ]);
    expect(summary.cancelled).toEqual([]);
    expect(batch.snapshot().state).toBe('completed');
  });

  it('publishes job status changes in order', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a', 'b'), {
      executor: new JobExecutor(runner),
      prober: fakeProber(),
    });
    const seen: string[] = [];
    batch.on('job-status', (job) => seen.push(`${job.id}:${job.status}`));

    await batch.run();

    expect(seen).toEqual(['a:running', 'a:succeeded', 'b:running', 'b:succeeded']);
  });

  it('stops publishing to a listener after it unsubscribes', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a'), { executor: new JobExecutor(runner), prober: fakeProber() });
    let calls = 0;
    const off = batch.on('batch-progress', () => {
      calls += 1;
    });
    off();

    await batch.run();

    expect(calls).toBe(0);
  });

  it('cancels every job without encoding when cancelled before start', async () => {
    const { runner, outputs } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a', 'b', 'c'), {
      executor: new JobExecutor(runner),
      prober: fakeProber(),
    });

    expect(batch.cancel('stop')).toBe(true);
    expect(batch.cancel('again')).toBe(false);
    const summary = await batch.run();

    expect(outputs).toEqual([]);
    expect(summary.cancelled).toEqual([
      { jobId: 'a', sourcePath: '/in/a.mp4', reason: 'stop' },
      { jobId: 'b', sourcePath: '/in/b.mp4', reason: 'stop' },
      { jobId: 'c', sourcePath: '/in/c.mp4', reason: 'stop' },
    ]);
    expect(batch.snapshot()).toMatchObject({ cancelled: true, completed: 3, progress: 1 });
  });

  it('stops the running job and skips the rest on cancel', async () => {
    const { runner, outputs } = fakeRunner((_args, { signal }) => untilAborted(signal));
    const batch = new BatchOrchestrator(jobsFor('a', 'b', 'c'), {
      executor: new JobExecutor(runner),
      prober: fakeProber(),
    });
    batch.on('job-status', (job) => {
      if (job.status === 'running') batch.cancel('user stop');
    });

    const summary = await batch.run();

    expect(outputs).toEqual(['vertical_a.mp4']);
    expect(summary.succeeded).toEqual([]);
    expect(summary.cancelled.map((c) => `${c.jobId}:${c.reason}`)).toEqual([
      'a:user stop',
      'b:user stop',
      'c:user stop',
    ]);
  });

  it('aborts the batch when the encoder cannot be spawned', async () => {
    const { runner, outputs } = fakeRunner(async () => {
      throw new EncoderSpawnError('ffmpeg', 'spawn ffmpeg ENOENT');
    });
    const batch = new BatchOrchestrator(jobsFor('a', 'b', 'c'), {
      executor: new JobExecutor(runner),
      prober: fakeProber(),
    });

    const summary = await batch.run();
    const reason = 'encoder unavailable: ffmpeg spawn failed: spawn ffmpeg ENOENT';

    expect(outputs).toEqual(['vertical_a.mp4']);
    expect(summary.failed).toEqual([
      { jobId: 'a', sourcePath: '/in/a.mp4', error: 'ffmpeg spawn failed: spawn ffmpeg ENOENT' },
    ]);
    expect(summary.cancelled.map((c) => c.reason)).toEqual([reason, reason]);
    expect(batch.snapshot().abortReason).toBe(reason);
  });

  it('aborts the batch when ffprobe cannot be spawned', async () => {
    const { runner, outputs } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a', 'b'), {
      executor: new JobExecutor(runner),
      prober: fakeProber({
        probeVideo: async () => {
          throw new EncoderSpawnError('ffprobe', 'spawn ffprobe ENOENT');
        },
      }),
    });

    const summary = await batch.run();

    expect(outputs).toEqual([]);
    expect(summary.failed.map((f) => f.jobId)).toEqual(['a']);
    expect(summary.cancelled).toEqual([
      { jobId: 'b', sourcePath: '/in/b.mp4', reason: 'encoder unavailable: ffprobe spawn failed: spawn ffprobe ENOENT' },
    ]);
  });

  it('fails a job whose source cannot be probed and moves on', async () => {
    const { runner, outputs } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a', 'b'), {
      executor: new JobExecutor(runner),
      prober: fakeProber({
        probeVideo: async (filePath) => {
          if (filePath === '/in/a.mp4') throw new ProbeError('ffprobe: no video stream or missing width/height');
          return landscape;
        },
      }),
    });
    const statuses: string[] = [];
    batch.on('job-status', (job) => statuses.push(`${job.id}:${job.status}`));

    const summary = await batch.run();

    expect(outputs).toEqual(['vertical_b.mp4']);
    expect(statuses[0]).toBe('a:failed');
    expect(summary.failed).toEqual([
      { jobId: 'a', sourcePath: '/in/a.mp4', error: 'ffprobe: no video stream or missing width/height' },
    ]);
    expect(summary.succeeded.map((s) => s.jobId)).toEqual(['b']);
  });

  it('reports an unreadable watermark asset against the job', async () => {
    const { runner } = fakeRunner(async () => ok);
    const job = createConversionJob(
      {
        sourcePath: '/in/a.mp4',
        outputPath: path.join(dir, 'vertical_a.mp4'),
        watermark: { assetPath: '/missing/logo.png' },
      },
      'a',
    );
    const batch = new BatchOrchestrator([job], {
      executor: new JobExecutor(runner),
      prober: fakeProber({
        probeImage: async () => {
          throw new ProbeError('ffprobe exited with code 1. stderr: No such file or directory');
        },
      }),
    });

    const summary = await batch.run();

    expect(summary.failed[0].error).toBe(
      'Cannot read watermark asset /missing/logo.png: ffprobe exited with code 1. stderr: No such file or directory',
    );
  });

  it('fails a job whose geometry cannot be resolved', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a'), {
      executor: new JobExecutor(runner),
      prober: fakeProber({ probeVideo: async () => ({ ...landscape, width: 1, height: 1 }) }),
    });

    const summary = await batch.run();

    expect(summary.failed[0].error).toBe('Job a: Crop degenerates to 0x1 for source 1x1 at zoom 1');
  });

  it('completes an empty batch at full progress', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator([], { executor: new JobExecutor(runner), prober: fakeProber() }, 'empty');

    const summary = await batch.run();

    expect(summary).toEqual({ batchId: 'empty', succeeded: [], failed: [], cancelled: [] });
    expect(batch.snapshot()).toMatchObject({ total: 0, completed: 0, progress: 1 });
    expect(batch.cancel()).toBe(false);
  });

  it('refuses to run twice', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a'), { executor: new JobExecutor(runner), prober: fakeProber() }, 'b1');

    await batch.run();

    await expect(batch.run()).rejects.toThrow('Batch b1 already started');
  });

  it('hands out snapshots that do not change afterwards', async () => {
    const { runner } = fakeRunner(async () => ok);
    const batch = new BatchOrchestrator(jobsFor('a'), { executor: new JobExecutor(runner), prober: fakeProber() });
    const before = batch.snapshot();

    await batch.run();

    expect(before.state).toBe('pending');
    expect(before.jobs[0].status).toBe('pending');
    expect(Object.isFrozen(before.jobs)).toBe(true);
    expect(batch.snapshot().jobs[0].status).toBe('succeeded');
  });
});
