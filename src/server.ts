/**
 * Vertical video converter: HTTP server entrypoint.
 */

import { createApp } from './app';
import { BatchRegistry } from './batches/registry';
import { loadConfig } from './config';
import { JobExecutor } from './pipeline/executor';
import { createFfmpegRunner } from './utils/ffmpeg';
import { createProber } from './utils/ffprobe';

const config = loadConfig();
const prober = createProber(config.ffprobePath);
const executor = new JobExecutor(createFfmpegRunner(config.ffmpegPath));
const registry = new BatchRegistry(
  { executor, prober },
  { batchTimeoutSec: config.batchTimeoutSec, retentionSec: config.batchRetentionSec },
);

const app = createApp({ registry, prober, config });

app.listen(config.port, () => {
  console.log(`Vertical converter listening on port ${config.port}`);
});
