import { mkdir } from 'fs/promises';
import { createApp } from './app.js';
import { config } from './config.js';
import { Fetcher } from './core/fetcher.js';
import { Pipeline } from './core/pipeline.js';
import { StagingArea } from './core/staging.js';
import { Transcoder, checkToolchain } from './core/transcoder.js';
import { WebhookDeliveryTarget, type WebhookContext } from './providers/delivery/webhook.js';
import { createSourceResolver } from './providers/resolver/index.js';
import { createArtifactStorage } from './providers/storage/index.js';
import type { ArtifactStorage } from './providers/storage/types.js';
import { startIntakeWorker } from './queue/intake.js';
import type { AppContext } from './types/appContext.js';

function startArtifactCleanupLoop(storage: ArtifactStorage): { stop: () => void } {
  const timer = setInterval(async () => {
    try {
      const deleted = await storage.cleanupExpired(config.artifactRetentionHours);
      if (deleted > 0) {
        console.log(`[reelfetch] cleaned ${deleted} expired artifacts`);
      }
    } catch (error) {
      console.error('[reelfetch] artifact cleanup failed', error);
    }
  }, config.artifactCleanupIntervalMs);

  return {
    stop: () => clearInterval(timer),
  };
}

async function main() {
  if (config.storageBackend === 'local') {
    await mkdir(config.artifactsDir, { recursive: true });
  }

  const staging = new StagingArea(config.stagingRoot);
  const resolver = createSourceResolver();
  const storage = createArtifactStorage();

  const pipeline = new Pipeline<WebhookContext>({
    fetcher: new Fetcher({
      resolver,
      staging,
      fetchTimeoutMs: config.fetchTimeoutMs,
      maxBytes: config.maxDownloadBytes,
      hostAllowlist: config.sourceHostAllowlist,
    }),
    transcoder: new Transcoder({
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
      staging,
      timeouts: {
        baseMs: config.transcodeTimeoutBaseMs,
        perMiBMs: config.transcodeTimeoutPerMbMs,
        maxMs: config.transcodeTimeoutMaxMs,
      },
    }),
    target: new WebhookDeliveryTarget({
      storage,
      signingSecret: config.webhookSigningSecret,
      timeoutMs: config.deliveryTimeoutMs,
    }),
    staging,
    poolSize: config.poolSize,
    queueCapacity: config.queueCapacity,
    maxAttempts: config.maxAttempts,
    deliveryRetryDelayMs: config.deliveryRetryDelayMs,
  });
  await pipeline.start();

  const toolchain = await checkToolchain(config.ffmpegPath, config.ffprobePath);
  if (!toolchain.ffmpeg || !toolchain.ffprobe) {
    console.warn(
      `[reelfetch] toolchain incomplete ffmpeg=${toolchain.ffmpeg} ffprobe=${toolchain.ffprobe}; transcodes will fail`,
    );
  }

  const appCtx: AppContext = {
    pipeline,
    defaultPreset: config.defaultPreset,
    publicBaseUrl: config.publicBaseUrl,
    storageBackend: storage.name,
    retryAfterSeconds: 30,
    checkToolchain: () => checkToolchain(config.ffmpegPath, config.ffprobePath),
  };

  const cleanup = startArtifactCleanupLoop(storage);
  const intake = config.redisUrl
    ? startIntakeWorker(pipeline, { redisUrl: config.redisUrl, defaultPreset: config.defaultPreset })
    : undefined;

  const app = createApp(appCtx, {
    masterApiKey: config.masterApiKey,
    artifactsDir: config.storageBackend === 'local' ? config.artifactsDir : undefined,
  });

  const server = app.listen(config.port, () => {
    console.log(`[reelfetch] listening on ${config.publicBaseUrl}`);
    console.log(
      `[reelfetch] pool_size=${config.poolSize} queue_capacity=${config.queueCapacity} max_attempts=${config.maxAttempts} resolver=${resolver.name}`,
    );
    console.log(`[reelfetch] intake=${intake ? 'redis+http' : 'http'} default_preset=${config.defaultPreset}`);
    if (config.storageBackend === 'local') {
      console.log(`[reelfetch] artifacts_dir=${config.artifactsDir}`);
    } else {
      console.log(`[reelfetch] artifacts_bucket=${config.s3Bucket} endpoint=${config.s3Endpoint || 'aws'}`);
    }
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[reelfetch] shutting down; draining jobs');
    cleanup.stop();
    await intake?.close();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await pipeline.drainAndStop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('[reelfetch] shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('[reelfetch] fatal startup error', error);
  process.exit(1);
});
