/**
 * Express app: GET /health, /batches, POST /convert, POST /inspect.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import type { BatchRegistry } from './batches/registry';
import type { AppConfig } from './config';
import { ConversionError, JobValidationError, errorMessage } from './errors';
import { formatIssues } from './pipeline/job';
import { createBatchRouter } from './routes/batches';
import { createProcessHandlers } from './routes/process';
import { MAX_FILE_SIZE_BYTES } from './types';
import type { MediaProber } from './utils/ffprobe';

export interface AppDeps {
  registry: BatchRegistry;
  prober: MediaProber;
  config: AppConfig;
}

export interface ErrorResponse {
  status: number;
  body: { error: string; message: string; issues?: string[] };
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function fromConversionError(err: ConversionError): ErrorResponse {
  switch (err.code) {
    case 'INVALID_JOB':
      return {
        status: 400,
        body: {
          error: 'INVALID_REQUEST',
          message: err.message,
          ...(err instanceof JobValidationError ? { issues: err.issues } : {}),
        },
      };
    case 'INVALID_SOURCE':
      return { status: 400, body: { error: 'INVALID_SOURCE', message: err.message } };
    case 'PROBE_FAILED':
    case 'GEOMETRY_INVALID':
    case 'WATERMARK_ASSET_INVALID':
    case 'DESCRIPTOR_BUILD_FAILED':
    case 'UNKNOWN_PRESET':
      return { status: 422, body: { error: err.code, message: err.message } };
    case 'ENCODER_SPAWN_FAILED':
      return { status: 503, body: { error: 'ENCODER_UNAVAILABLE', message: err.message } };
    default:
      return { status: 500, body: { error: err.code, message: err.message } };
  }
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ConversionError) {
    return fromConversionError(err);
  }
  if (err instanceof ZodError) {
    const issues = formatIssues(err);
    return { status: 400, body: { error: 'INVALID_REQUEST', message: issues.join('; '), issues } };
  }
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return {
        status: 400,
        body: { error: 'FILE_TOO_LARGE', message: `File size exceeds ${MAX_FILE_SIZE_BYTES / 1024 / 1024}MB limit.` },
      };
    }
    const message = err.code === 'LIMIT_UNEXPECTED_FILE' ? 'Use multipart field "file" only.' : err.message;
    return { status: 400, body: { error: 'BAD_REQUEST', message } };
  }

  const msg = errorMessage(err);
  if (msg === 'FILE_NOT_VIDEO') {
    return { status: 415, body: { error: 'UNSUPPORTED_MEDIA', message: 'File is not a video (invalid MIME type).' } };
  }
  const status = httpStatusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return { status, body: { error: 'BAD_REQUEST', message: msg } };
  }
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: msg } };
}

export function createApp({ registry, prober, config }: AppDeps): express.Express {
  const app = express();
  const handlers = createProcessHandlers({ registry, prober, config });

  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/batches', createBatchRouter(registry, config));
  app.post('/convert', handlers.processTmpMiddleware, handlers.receiveUpload, handlers.convert);
  app.post('/inspect', handlers.inspect);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      console.error(`${req.method} ${req.path} failed:`, body.message);
    }
    res.status(status).json(body);
  });

  return app;
}
