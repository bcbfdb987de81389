/**
 * Temporary file handling for uploads: one unique directory per request,
 * removed by the caller once the output has been served.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique subdir under `root`. Caller is responsible for cleanup.
 */
export function createUniqueTmpDir(root: string): string {
  const sub = path.join(root, uuidv4());
  fs.mkdirSync(sub, { recursive: true });
  return sub;
}

/**
 * Sanitize filename: only allow alphanumeric, dash, underscore, dot.
 * Used for uploaded names and Content-Disposition, never for user-chosen paths.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, '_').slice(0, 200) || 'video';
}

/**
 * Encoded upload output: dir/out/output.mp4. Uploads land directly in `dir`,
 * so no upload name can collide with it.
 */
export function uploadOutputPath(dir: string): string {
  return path.join(dir, 'out', 'output.mp4');
}

/**
 * Recursively delete a directory and all contents. Idempotent.
 */
export function rmDirRecursive(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
