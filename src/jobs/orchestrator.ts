import fs from "node:fs/promises";
import path from "node:path";
import type { SubtitleNormalizer } from "../services/subtitleNormalizer";
import type {
  BurnInSettings,
  Job,
  SoftEmbedSettings,
  SubtitleSource,
  Task,
  TaskStatus,
} from "../types/models";
import { CancellationSignal, ProcessFailure, errorMessage } from "../utils/errors";
import { buildBurnInArgs, buildSoftEmbedArgs } from "../utils/ffmpeg";
import { keepTail, type StreamingOptions, type StreamingProcess } from "../utils/process";
import { advanceProgress, monitorProgress, startProgress } from "../utils/progress";
import { fileExists } from "../utils/storage";
import type { CancellationToken } from "./cancellation";
import type { JobPatch, JobRegistry } from "./registry";
import type { Downloader, Encoder, MediaProber, TranscodeRunner } from "./types";

export interface OrchestratorSettings {
  downloadsDir: string;
  processingDir: string;
  burnIn: BurnInSettings;
  softEmbed: SoftEmbedSettings;
  killGraceMs: number;
}

export interface OrchestratorDependencies {
  registry: JobRegistry;
  downloader: Downloader;
  encoder: Encoder;
  transcoder: TranscodeRunner;
  prober: MediaProber;
  normalizer: Pick<SubtitleNormalizer, "validate" | "normalize">;
  settings: OrchestratorSettings;
}

const TASK = {
  video: 0,
  subtitle: 1,
  subtitles: 2,
  encode: 3,
} as const;

type TaskIndex = (typeof TASK)[keyof typeof TASK];

export const buildTasks = (subtitle: SubtitleSource): Task[] => [
  { name: "Download Video", status: "pending" },
  { name: subtitle.kind === "file" ? "Upload Subtitle" : "Download Subtitle", status: "pending" },
  { name: "Process Subtitles", status: "pending" },
  { name: "Encode Videos", status: "pending" },
];

const withTaskStatus = (tasks: Task[], index: number, status: TaskStatus): Task[] =>
  tasks.map((task, position) => (position === index ? { ...task, status } : task));

/**
 * Runs one job through download, subtitle acquisition, subtitle processing
 * and rendition encoding. Every stage starts with a cancellation checkpoint;
 * the transcode stage also checks on every status line.
 */
export class JobOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  /** Never rejects: every outcome is written to the registry. */
  async run(jobId: string): Promise<void> {
    const { registry } = this.deps;
    const job = registry.get(jobId);
    if (!job) {
      console.error(`[orchestrator] job not found: ${jobId}`);
      return;
    }

    try {
      registry.claim(jobId);
    } catch (error) {
      console.error(`[orchestrator] ${errorMessage(error)}`);
      return;
    }

    const current: { task: TaskIndex | null } = { task: null };
    try {
      await this.execute(job, registry.tokenFor(jobId), current);
      this.update(jobId, (snapshot) => ({
        status: "completed",
        stage: "Completed",
        progress: { ...snapshot.progress, percentage: 100 },
      }));
      console.log(`[orchestrator] job ${jobId} completed`);
    } catch (error) {
      if (error instanceof CancellationSignal) {
        this.markCancelling(jobId);
        this.finish(jobId, "cancelled", error.message, current.task);
        console.log(`[orchestrator] job ${jobId}: ${error.message}`);
      } else {
        this.finish(jobId, "failed", errorMessage(error), current.task);
        console.error(`[orchestrator] job ${jobId} failed: ${errorMessage(error)}`);
      }
    } finally {
      registry.archive(jobId);
    }
  }

  private async execute(job: Job, token: CancellationToken, current: { task: TaskIndex | null }): Promise<void> {
    const { downloader, encoder, prober, normalizer, settings } = this.deps;
    const { id, request } = job;

    current.task = TASK.video;
    this.enterStage(id, token, "Downloading video", TASK.video);
    const videoPath = await downloader.fetch(request.videoUrl, settings.downloadsDir, "video", (received, total) =>
      this.reportProgress(id, received, total),
    );
    this.completeTask(id, TASK.video);

    current.task = TASK.subtitle;
    let subtitlePath: string;
    if (request.subtitle.kind === "url") {
      this.enterStage(id, token, "Downloading subtitle", TASK.subtitle);
      subtitlePath = await downloader.fetch(request.subtitle.url, settings.downloadsDir, "subtitle", (received, total) =>
        this.reportProgress(id, received, total),
      );
    } else {
      this.enterStage(id, token, "Using uploaded subtitle", TASK.subtitle);
      subtitlePath = request.subtitle.path;
    }
    await normalizer.validate(subtitlePath);
    this.completeTask(id, TASK.subtitle);

    current.task = TASK.subtitles;
    this.enterStage(id, token, "Processing subtitles", TASK.subtitles);
    const info = await prober.probe(videoPath);
    console.log(
      `[orchestrator] job ${id}: video ${info.width}x${info.height}, ${info.durationSec.toFixed(2)}s, ${info.codec}`,
    );

    const normalized = await normalizer.normalize(subtitlePath, {
      workDir: settings.processingDir,
      baseName: `${id}_subtitle`,
      burnIn: !request.softSubtitle,
    });
    token.throwIfCancellationRequested("subtitle processing");

    const processedPath = path.join(
      settings.processingDir,
      `${id}_${request.softSubtitle ? "subtitled" : "hardsubbed"}.mp4`,
    );
    const args = request.softSubtitle
      ? buildSoftEmbedArgs({
          inputVideoPath: videoPath,
          subtitlePath: normalized.path,
          outputPath: processedPath,
          settings: settings.softEmbed,
        })
      : buildBurnInArgs({
          inputVideoPath: videoPath,
          subtitlePath: normalized.path,
          outputPath: processedPath,
          fontsDir: normalized.font?.fontsDir,
          settings: settings.burnIn,
        });

    this.update(id, () => ({
      stage: request.softSubtitle ? "Embedding subtitles" : "Burning subtitles",
      progress: startProgress(info.durationSec),
    }));
    await this.runTranscode(
      id,
      args,
      processedPath,
      info.durationSec,
      token,
      normalized.fontConfigPath ? { env: { FONTCONFIG_FILE: normalized.fontConfigPath } } : undefined,
    );
    this.completeTask(id, TASK.subtitles);

    current.task = TASK.encode;
    const total = request.resolutions.length;
    this.enterStage(id, token, "Encoding videos", TASK.encode, total);
    for (const [index, resolution] of request.resolutions.entries()) {
      token.throwIfCancellationRequested(`encoding ${resolution}`);
      this.update(id, () => ({ stage: `Encoding ${resolution} (${index + 1}/${total})` }));

      const outputPath = await encoder.encode(processedPath, resolution);
      this.update(id, (snapshot) => ({
        outputs: { ...snapshot.outputs, [resolution]: outputPath },
        progress: advanceProgress(snapshot.progress, index + 1, total),
      }));
      console.log(`[orchestrator] job ${id}: ${resolution} ready at ${outputPath}`);
    }
    this.completeTask(id, TASK.encode);
    current.task = null;
  }

  private async runTranscode(
    jobId: string,
    args: string[],
    outputPath: string,
    totalSec: number,
    token: CancellationToken,
    options?: StreamingOptions,
  ): Promise<void> {
    const handle = this.deps.transcoder.run(args, options);
    const tail: string[] = [];

    try {
      await monitorProgress(
        keepTail(handle.lines, tail),
        totalSec,
        (elapsed, total) => this.reportProgress(jobId, elapsed, total),
        token,
      );
    } catch (error) {
      if (error instanceof CancellationSignal) {
        this.markCancelling(jobId);
      }
      await this.terminate(handle);
      await fs.rm(outputPath, { force: true });
      throw error;
    }

    const exit = await handle.exited;
    if (exit.error || exit.code !== 0) {
      await fs.rm(outputPath, { force: true });
      throw ProcessFailure.fromExit("ffmpeg", exit, tail.join("\n"));
    }
    if (!(await fileExists(outputPath))) {
      throw new Error(`Output file was not created: ${outputPath}`);
    }
  }

  /** SIGTERM, then SIGKILL once the grace period runs out. */
  private async terminate(handle: StreamingProcess): Promise<void> {
    if (!handle.isRunning()) {
      await handle.exited;
      return;
    }

    handle.kill("SIGTERM");
    const exitedInTime = await new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.deps.settings.killGraceMs);
      void handle.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });

    if (!exitedInTime && handle.isRunning()) {
      console.warn("[orchestrator] ffmpeg ignored SIGTERM, sending SIGKILL");
      handle.kill("SIGKILL");
    }
    await handle.exited;
  }

  private enterStage(jobId: string, token: CancellationToken, stage: string, task: TaskIndex, total = 0): void {
    token.throwIfCancellationRequested(stage.toLowerCase());
    this.update(jobId, (snapshot) => ({
      status: "processing",
      stage,
      tasks: withTaskStatus(snapshot.tasks, task, "in_progress"),
      progress: startProgress(total),
    }));
    console.log(`[orchestrator] job ${jobId}: ${stage}`);
  }

  private completeTask(jobId: string, task: TaskIndex): void {
    this.update(jobId, (snapshot) => ({ tasks: withTaskStatus(snapshot.tasks, task, "completed") }));
  }

  private reportProgress(jobId: string, current: number, total: number): void {
    this.update(jobId, (snapshot) => ({ progress: advanceProgress(snapshot.progress, current, total) }));
  }

  private markCancelling(jobId: string): void {
    this.update(jobId, (snapshot) =>
      snapshot.status === "queued" || snapshot.status === "processing"
        ? { status: "cancelling", stage: "Cancelling" }
        : {},
    );
  }

  private finish(jobId: string, status: "failed" | "cancelled", message: string, task: TaskIndex | null): void {
    this.update(jobId, (snapshot) => ({
      status,
      stage: status === "failed" ? "Failed" : "Cancelled",
      error: message,
      tasks:
        task !== null && snapshot.tasks[task]?.status === "in_progress"
          ? withTaskStatus(snapshot.tasks, task, "failed")
          : snapshot.tasks,
    }));
  }

  private update(jobId: string, mutator: (snapshot: Job) => JobPatch): void {
    this.deps.registry.update(jobId, mutator);
  }
}
