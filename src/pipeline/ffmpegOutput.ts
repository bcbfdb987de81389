/**
 * Readers for ffmpeg's stderr: the `time=` progress marker and the
 * diagnostic lines worth surfacing on failure.
 */

const TIME_MARKER = /time=\s*(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)/;
const MAX_DIAGNOSTIC_CHARS = 2000;

/** "HH:MM:SS.ss" -> seconds. */
export function parseTimecode(value: string): number | undefined {
  const parts = value.trim().split(':');
  if (parts.length !== 3) return undefined;
  const [hours, minutes, seconds] = parts.map((part) => Number.parseFloat(part));
  if (![hours, minutes, seconds].every(Number.isFinite)) return undefined;
  return hours * 3600 + minutes * 60 + seconds;
}

export function parseElapsedSeconds(line: string): number | undefined {
  const match = TIME_MARKER.exec(line);
  if (!match) return undefined;
  return parseTimecode(`${match[1]}:${match[2]}:${match[3]}`);
}

export type StderrParser = (chunk: string) => void;

/**
 * Feeds raw stderr chunks; calls `onFraction` with elapsed / duration for
 * every complete status line. ffmpeg rewrites its status line with `\r`, so
 * both `\r` and `\n` end a line. Nothing is reported without a duration.
 */
export function createProgressParser(
  durationSec: number,
  onFraction: (fraction: number) => void,
): StderrParser {
  let buffer = '';
  const hasDuration = Number.isFinite(durationSec) && durationSec > 0;

  return (chunk: string) => {
    buffer += chunk;
    const lines = buffer.split(/\r\n|\r|\n/);
    buffer = lines.pop() ?? '';
    if (!hasDuration) return;

    for (const line of lines) {
      const elapsed = parseElapsedSeconds(line);
      if (elapsed === undefined) continue;
      onFraction(Math.min(1, Math.max(0, elapsed / durationSec)));
    }
  };
}

/**
 * Last three lines mentioning "error", else the last non-empty lines,
 * capped at 2000 characters.
 */
export function summarizeDiagnostics(stderr: string): string {
  const lines = stderr
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) return 'No diagnostic output';

  const errors = lines.filter((line) => line.toLowerCase().includes('error'));
  const picked = errors.length > 0 ? errors.slice(-3) : lines.slice(-3);
  return picked.join('\n').slice(-MAX_DIAGNOSTIC_CHARS);
}
