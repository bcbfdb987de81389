/**
 * POST /convert (upload one video, encode it as a one-job batch) and
 * POST /inspect (resolve transforms without encoding).
 */

import type { NextFunction, Request, Response } from 'express';
import * as path from 'path';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import type { BatchRegistry } from '../batches/registry';
import type { AppConfig } from '../config';
import { buildTransformDescriptor } from '../pipeline/descriptor';
import { buildFfmpegArgs } from '../pipeline/ffmpegArgs';
import { createConversionJob } from '../pipeline/job';
import { MAX_FILE_SIZE_BYTES, type TransformDescriptor } from '../types';
import type { MediaProber } from '../utils/ffprobe';
import { buildOutputPath, discoverSources } from '../utils/sources';
import { createUniqueTmpDir, rmDirRecursive, sanitizeFilename, uploadOutputPath } from '../utils/tmp';
import { inspectRequestSchema, paramsFromForm, toJobInput } from './params';

const VIDEO_MIMES = ['video/mp4', 'video/quicktime', 'video/x-msvideo', 'video/webm', 'video/x-matroska', 'video/x-ms-wmv'];
const ALLOWED_MIMES = new Set(VIDEO_MIMES);

type UploadRequest = Request & { requestId?: string; uniqueTmpDir?: string };

function isVideoMime(mime: string): boolean {
  if (!mime) return false;
  if (ALLOWED_MIMES.has(mime)) return true;
  return mime.startsWith('video/');
}

function cleanupUpload(req: UploadRequest): void {
  if (!req.uniqueTmpDir) return;
  try {
    rmDirRecursive(req.uniqueTmpDir);
  } catch (err) {
    console.error(`[${req.requestId}] tmp cleanup failed:`, err);
  }
}

export interface ProcessRouteDeps {
  registry: BatchRegistry;
  prober: MediaProber;
  config: AppConfig;
}

export function createProcessHandlers({ registry, prober, config }: ProcessRouteDeps) {
  /**
   * Middleware: create requestId and unique tmp dir, attach to req.
   */
  function processTmpMiddleware(req: UploadRequest, _res: Response, next: NextFunction): void {
    req.requestId = uuidv4();
    req.uniqueTmpDir = createUniqueTmpDir(config.tmpRoot);
    next();
  }

  const storage = multer.diskStorage({
    destination(req: UploadRequest, _file, cb) {
      const dir = req.uniqueTmpDir;
      if (!dir) return cb(new Error('missing uniqueTmpDir'), '');
      cb(null, dir);
    },
    filename(_req, file, cb) {
      const raw = file.originalname || 'video';
      const ext = path.extname(raw) || '.mp4';
      const base = path.basename(raw, ext) || 'video';
      cb(null, sanitizeFilename(base) + ext);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: MAX_FILE_SIZE_BYTES },
    fileFilter(_req, file, cb) {
      if (!isVideoMime(file.mimetype)) {
        cb(new Error('FILE_NOT_VIDEO'));
        return;
      }
      cb(null, true);
    },
  });

  /** Runs multer and drops the request's tmp dir if the upload fails. */
  function receiveUpload(req: UploadRequest, res: Response, next: NextFunction): void {
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        cleanupUpload(req);
        next(err);
        return;
      }
      next();
    });
  }

  /**
   * POST /convert
   */
  function convert(req: UploadRequest, res: Response, next: NextFunction): void {
    try {
      if (!req.file || !req.uniqueTmpDir) {
        cleanupUpload(req);
        res.status(400).json({ error: 'NO_FILE', message: 'No file uploaded. Use multipart field "file".' });
        return;
      }
      const params = paramsFromForm(req.body ?? {});
      const job = createConversionJob(
        toJobInput(req.file.path, uploadOutputPath(req.uniqueTmpDir), params, config),
      );
      const { orchestrator } = registry.start([job], req.uniqueTmpDir);
      console.log(`[${req.requestId}] convert | ${req.file.originalname} ${req.file.size}B | batch ${orchestrator.id}`);
      res.status(202).json(orchestrator.snapshot());
    } catch (e) {
      cleanupUpload(req);
      next(e);
    }
  }

  /**
   * POST /inspect: descriptor and ffmpeg argv for every source, no encoding.
   */
  async function inspect(req: Request, res: Response, next: NextFunction): Promise<void> {
    const start = Date.now();
    try {
      const body = inspectRequestSchema.parse(req.body ?? {});
      const sources = await discoverSources(body.source);
      const results: { sourcePath: string; descriptor: TransformDescriptor; args: string[] }[] = [];
      for (const sourcePath of sources) {
        const outputDir = body.outputDir ? path.resolve(body.outputDir) : path.dirname(sourcePath);
        const job = createConversionJob(
          toJobInput(sourcePath, buildOutputPath(outputDir, sourcePath), body, config),
        );
        const source = await prober.probeVideo(sourcePath);
        const watermarkAsset = job.watermark ? await prober.probeImage(job.watermark.assetPath) : undefined;
        const descriptor = buildTransformDescriptor(job, { source, watermarkAsset });
        results.push({ sourcePath, descriptor, args: buildFfmpegArgs(descriptor) });
      }
      console.log(`[inspect] ${results.length} sources | ${Date.now() - start}ms`);
      res.status(200).json(results);
    } catch (e) {
      next(e);
    }
  }

  return { processTmpMiddleware, receiveUpload, convert, inspect };
}
