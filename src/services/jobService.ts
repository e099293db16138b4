import { v4 as uuidv4 } from "uuid";
import { buildTasks, type JobOrchestrator } from "../jobs/orchestrator";
import { isTerminalStatus, type JobRegistry } from "../jobs/registry";
import type { Job, JobRequest, JobSummary, ResolutionLabel } from "../types/models";
import { ValidationError } from "../utils/errors";
import { jobRequestSchema } from "../utils/validators";

export interface SubmitInput {
  videoUrl: unknown;
  subtitle: unknown;
  resolutions?: unknown;
  softSubtitle?: unknown;
}

export interface JobServiceDefaults {
  resolutions: string[];
  softSubtitle: boolean;
}

export type CancelOutcome = "ok" | "not_found";

export const toSummary = (job: Job): JobSummary => ({
  id: job.id,
  status: job.status,
  stage: job.stage,
  percentage: job.progress.percentage,
  resolutions: job.request.resolutions,
  softSubtitle: job.request.softSubtitle,
  error: job.error,
  createdAt: job.createdAt,
  updatedAt: job.updatedAt,
});

/**
 * Entry point for callers: validates requests, registers jobs and starts
 * one orchestrator run per job.
 */
export class JobService {
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: JobRegistry,
    private readonly orchestrator: Pick<JobOrchestrator, "run">,
    private readonly defaults: JobServiceDefaults,
    private readonly createId: () => string = uuidv4,
  ) {}

  submit(input: SubmitInput): string {
    const parsed = jobRequestSchema.safeParse({
      videoUrl: input.videoUrl,
      subtitle: input.subtitle,
      resolutions: input.resolutions ?? this.defaults.resolutions,
      softSubtitle: input.softSubtitle ?? this.defaults.softSubtitle,
    });
    if (!parsed.success) {
      throw new ValidationError("Invalid job request", parsed.error.issues);
    }

    const request: JobRequest = parsed.data;
    const id = this.createId();
    this.registry.create(id, { request, tasks: buildTasks(request.subtitle) });
    console.log(
      `[jobs] job ${id} queued (${request.softSubtitle ? "soft" : "burn-in"}, ${request.resolutions.join(", ")})`,
    );

    // Deferred so a cancel issued right after submit lands before the first stage.
    const run = Promise.resolve()
      .then(() => this.orchestrator.run(id))
      .finally(() => {
        this.running.delete(id);
      });
    this.running.set(id, run);
    return id;
  }

  getStatus(id: string): Job | null {
    return this.registry.get(id) ?? null;
  }

  cancel(id: string): CancelOutcome {
    const job = this.registry.get(id);
    if (!job) {
      return "not_found";
    }
    if (isTerminalStatus(job.status)) {
      return "ok";
    }
    this.registry.markCancelled(id);
    console.log(`[jobs] cancellation requested for job ${id}`);
    return "ok";
  }

  listAll(): JobSummary[] {
    return this.registry.list().map(toSummary);
  }

  getOutput(id: string, resolution: ResolutionLabel): string | null {
    const job = this.registry.get(id);
    if (!job || job.status !== "completed") {
      return null;
    }
    return job.outputs[resolution] ?? null;
  }

  counts(): { active: number; completed: number } {
    return this.registry.counts();
  }

  async waitFor(id: string): Promise<void> {
    await this.running.get(id);
  }

  /** Asks every unfinished job to stop and waits for them. */
  async close(): Promise<void> {
    for (const id of this.running.keys()) {
      this.registry.markCancelled(id);
    }
    await Promise.all(this.running.values());
  }
}
