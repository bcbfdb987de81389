/**
 * Source discovery: a single video file, or every supported video directly
 * inside a folder (not recursive), in name order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { InvalidSourceError } from '../errors';
import { OUTPUT_PREFIX, SUPPORTED_VIDEO_EXTENSIONS } from '../types';

const SUPPORTED = new Set<string>(SUPPORTED_VIDEO_EXTENSIONS);

export function isSupportedVideo(filePath: string): boolean {
  return SUPPORTED.has(path.extname(filePath).toLowerCase());
}

/**
 * Output sits in `outputDir` under the source's own name with a fixed
 * prefix: clip.mov -> vertical_clip.mov.
 */
export function buildOutputPath(outputDir: string, sourcePath: string): string {
  return path.join(outputDir, `${OUTPUT_PREFIX}${path.basename(sourcePath)}`);
}

async function statOrThrow(target: string): Promise<fs.Stats> {
  try {
    return await fs.promises.stat(target);
  } catch {
    throw new InvalidSourceError(`Path does not exist: ${target}`);
  }
}

export async function discoverSources(source: string): Promise<string[]> {
  const resolved = path.resolve(source);
  const stat = await statOrThrow(resolved);

  if (stat.isFile()) {
    if (stat.size === 0) {
      throw new InvalidSourceError(`Input file is empty: ${resolved}`);
    }
    return [resolved];
  }

  if (!stat.isDirectory()) {
    throw new InvalidSourceError(`Not a file or folder: ${resolved}`);
  }

  const entries = await fs.promises.readdir(resolved, { withFileTypes: true });
  const videos = entries
    .filter((e) => e.isFile() && isSupportedVideo(e.name))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(resolved, name));

  if (videos.length === 0) {
    throw new InvalidSourceError(
      `No ${SUPPORTED_VIDEO_EXTENSIONS.join(' ')} files found in ${resolved}`,
    );
  }
  return videos;
}
