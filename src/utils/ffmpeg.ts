/**
 * FFmpeg process runner: spawn without a shell, stream stderr, stop on abort.
 * No timeout of its own; callers abort the signal after their deadline. An
 * aborted process that ignores SIGTERM is killed after KILL_GRACE_MS.
 */

import { spawn } from 'child_process';
import { CancelledError, EncoderSpawnError } from '../errors';
import makeDebug from './debug';

const debug = makeDebug('ffmpeg');

/** Keep the stderr tail only; a long encode prints megabytes of status lines. */
const STDERR_TAIL_CHARS = 16_000;

/** Time between SIGTERM and SIGKILL when a run is aborted. */
export const KILL_GRACE_MS = 5_000;

export interface EncoderRunOptions {
  signal?: AbortSignal;
  onStderr?: (chunk: string) => void;
}

export interface EncoderExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

/**
 * Runs the encoder to completion. Resolves with the exit status whatever it
 * is; rejects with EncoderSpawnError when the binary cannot be started and
 * with CancelledError when the signal stopped the process.
 */
export interface EncoderRunner {
  run(args: readonly string[], options?: EncoderRunOptions): Promise<EncoderExit>;
}

function abortReason(signal: AbortSignal): string {
  return typeof signal.reason === 'string' ? signal.reason : 'cancelled';
}

export function runFfmpeg(
  binary: string,
  args: readonly string[],
  options: EncoderRunOptions = {},
): Promise<EncoderExit> {
  const { signal, onStderr } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(abortReason(signal)));
      return;
    }

    let settled = false;
    let killedOnAbort = false;
    let killTimer: NodeJS.Timeout | undefined;
    let stderr = '';

    debug('spawn %s %o', binary, args);
    const proc = spawn(binary, [...args], { stdio: ['ignore', 'ignore', 'pipe'] });

    const onAbort = (): void => {
      if (settled || proc.exitCode !== null) return;
      killedOnAbort = true;
      debug('abort: sending SIGTERM to pid %d', proc.pid);
      proc.kill('SIGTERM');
      if (settled) return;
      killTimer = setTimeout(() => {
        if (settled) return;
        debug('pid %d ignored SIGTERM, sending SIGKILL', proc.pid);
        proc.kill('SIGKILL');
      }, KILL_GRACE_MS);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
      return true;
    };

    proc.stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stderr = (stderr + text).slice(-STDERR_TAIL_CHARS);
      onStderr?.(text);
    });

    proc.on('error', (err) => {
      // Spawn failures leave no pid; anything else is reported by 'close'.
      if (proc.pid !== undefined || !finish()) return;
      reject(new EncoderSpawnError(binary, err.message));
    });

    proc.on('close', (code, exitSignal) => {
      if (!finish()) return;
      debug('exit code=%s signal=%s', code, exitSignal);
      if (killedOnAbort && signal) {
        reject(new CancelledError(abortReason(signal)));
        return;
      }
      resolve({ code, signal: exitSignal, stderr });
    });
  });
}

export function createFfmpegRunner(binary: string): EncoderRunner {
  return {
    run: (args, options) => runFfmpeg(binary, args, options),
  };
}
