/**
 * /batches routes: start a batch over a file or folder, read snapshots,
 * cancel, and download a finished job's output.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import { pipeline } from 'stream';
import type { BatchRegistry } from '../batches/registry';
import type { AppConfig } from '../config';
import { createConversionJob } from '../pipeline/job';
import { OUTPUT_PREFIX } from '../types';
import { buildOutputPath, discoverSources } from '../utils/sources';
import { sanitizeFilename } from '../utils/tmp';
import { batchRequestSchema, toJobInput } from './params';

function notFound(res: Response, what: string): void {
  res.status(404).json({ error: 'NOT_FOUND', message: `${what} not found` });
}

export function createBatchRouter(registry: BatchRegistry, config: AppConfig): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = batchRequestSchema.parse(req.body ?? {});
      const sources = await discoverSources(body.source);
      const outputDir = path.resolve(body.outputDir);
      const jobs = sources.map((sourcePath) =>
        createConversionJob(toJobInput(sourcePath, buildOutputPath(outputDir, sourcePath), body, config)),
      );
      const { orchestrator } = registry.start(jobs);
      console.log(`[${orchestrator.id}] batches | ${jobs.length} jobs | ${body.source} -> ${outputDir}`);
      res.status(202).json(orchestrator.snapshot());
    } catch (e) {
      next(e);
    }
  });

  router.get('/', (_req: Request, res: Response) => {
    res.json(registry.list());
  });

  router.get('/:id', (req: Request, res: Response) => {
    const record = registry.get(req.params.id);
    if (!record) return notFound(res, 'Batch');
    res.json(record.orchestrator.snapshot());
  });

  router.get('/:id/summary', (req: Request, res: Response) => {
    const record = registry.get(req.params.id);
    if (!record) return notFound(res, 'Batch');
    res.json(record.orchestrator.summary());
  });

  router.post('/:id/cancel', (req: Request, res: Response) => {
    const snapshot = registry.cancel(req.params.id);
    if (!snapshot) return notFound(res, 'Batch');
    res.status(202).json(snapshot);
  });

  router.get('/:id/jobs/:jobId/output', (req: Request, res: Response) => {
    const record = registry.get(req.params.id);
    if (!record) return notFound(res, 'Batch');
    const job = record.orchestrator.snapshot().jobs.find((j) => j.id === req.params.jobId);
    if (!job) return notFound(res, 'Job');
    if (job.status !== 'succeeded') {
      res.status(409).json({ error: 'NOT_READY', message: `Job is ${job.status}` });
      return;
    }
    if (!fs.existsSync(job.outputPath)) {
      return notFound(res, 'Output file');
    }

    // Uploads are encoded to output.mp4; name the download after the upload.
    const filename = record.tmpDir
      ? `${OUTPUT_PREFIX}${sanitizeFilename(path.parse(job.sourcePath).name)}.mp4`
      : sanitizeFilename(path.basename(job.outputPath));
    const stat = fs.statSync(job.outputPath);

    res.type(record.tmpDir ? '.mp4' : path.extname(job.outputPath));
    res.set({
      'Content-Length': String(stat.size),
      'Content-Disposition': `attachment; filename="${filename}"`,
    });
    // An upload's output is served once, whether or not the client read it all.
    pipeline(fs.createReadStream(job.outputPath), res, (streamErr) => {
      if (streamErr) {
        console.error(`[${record.orchestrator.id}] stream error:`, streamErr.message);
      }
      if (record.tmpDir) registry.releaseTmpDir(record);
    });
  });

  return router;
}
