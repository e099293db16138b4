import "./config/loadEnv";
import { createApp } from "./api/createApp";
import { env } from "./config/env";
import { JobOrchestrator } from "./jobs/orchestrator";
import { JobRegistry } from "./jobs/registry";
import { HttpDownloader } from "./services/downloader";
import { FfmpegEncoder, FfprobeProber } from "./services/encoder";
import { JobService } from "./services/jobService";
import { SubtitleNormalizer } from "./services/subtitleNormalizer";
import { createFfmpegRunner } from "./utils/ffmpeg";
import { ensureStorageDirs, storagePaths } from "./utils/storage";
import { subtitleStyleSchema } from "./utils/validators";

const bootstrap = async (): Promise<void> => {
  const style = subtitleStyleSchema.safeParse(env.subtitleStyle);
  if (!style.success) {
    throw new Error(`Invalid subtitle style configuration: ${style.error.issues.map((issue) => issue.message).join("; ")}`);
  }

  await ensureStorageDirs();

  const transcoder = createFfmpegRunner(env.ffmpegPath);
  const registry = new JobRegistry();
  const orchestrator = new JobOrchestrator({
    registry,
    downloader: new HttpDownloader(),
    encoder: new FfmpegEncoder({
      ffmpegPath: env.ffmpegPath,
      outputDir: storagePaths.output,
      videoCodec: env.videoCodec,
      crf: env.videoCrf,
      preset: env.videoPreset,
      audioCodec: env.audioCodec,
      audioBitrate: env.audioBitrate,
    }),
    transcoder,
    prober: new FfprobeProber(env.ffprobePath),
    normalizer: new SubtitleNormalizer(transcoder, {
      style: style.data,
      fonts: {
        fontsDir: env.fontsDir,
        bundledFontFile: env.bundledFontFile,
        bundledFontName: env.bundledFontName,
        candidates: env.fontCandidates,
      },
    }),
    settings: {
      downloadsDir: storagePaths.downloads,
      processingDir: storagePaths.processing,
      burnIn: {
        videoCodec: env.videoCodec,
        crf: env.videoCrf,
        preset: env.videoPreset,
        threads: env.ffmpegThreads,
        maxMuxingQueueSize: env.maxMuxingQueueSize,
        lowMemoryMode: env.lowMemoryMode,
      },
      softEmbed: {
        subtitleCodec: env.subtitleCodec,
        language: env.subtitleLanguage,
        title: env.subtitleTitle,
      },
      killGraceMs: env.killGraceMs,
    },
  });

  const jobService = new JobService(registry, orchestrator, {
    resolutions: env.defaultResolutions,
    softSubtitle: env.defaultSoftSubtitle,
  });

  const app = createApp({ jobService });

  const server = app.listen(env.port, () => {
    console.log(`[backend] listening at http://localhost:${env.port}`);
    console.log(`[backend] storageDir=${env.storageDir}, lowMemoryMode=${env.lowMemoryMode}`);
    console.log(`[backend] defaultResolutions=${env.defaultResolutions.join(",")}, softSubtitle=${env.defaultSoftSubtitle}`);
  });

  const shutdown = async (): Promise<void> => {
    server.close();
    await jobService.close();
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
};

bootstrap().catch((error) => {
  console.error("Failed to start backend", error);
  process.exit(1);
});
