import type { Job, JobRequest, JobStatus, Task } from "../types/models";
import { CancellationToken } from "./cancellation";

export type JobPatch = Partial<Omit<Job, "id" | "request" | "createdAt" | "updatedAt">>;

export type JobMutator = (snapshot: Job) => JobPatch;

export interface NewJobFields {
  request: JobRequest;
  tasks: Task[];
}

interface Entry {
  job: Job;
  seq: number;
}

const STATUS_RANK: Record<JobStatus, number> = {
  queued: 0,
  processing: 1,
  cancelling: 2,
  completed: 3,
  failed: 3,
  cancelled: 3,
};

export const isTerminalStatus = (status: JobStatus): boolean => STATUS_RANK[status] === 3;

export const canTransition = (from: JobStatus, to: JobStatus): boolean => {
  if (from === to) {
    return true;
  }
  if (isTerminalStatus(from)) {
    return false;
  }
  return STATUS_RANK[to] > STATUS_RANK[from];
};

/**
 * Owns every job record. Active jobs live in one partition until the
 * orchestrator archives them into the completed one; nothing is ever removed.
 *
 * Each call runs to completion on the event loop, so a mutator is applied
 * atomically. Callers only receive deep copies, never the live entry.
 */
export class JobRegistry {
  private readonly active = new Map<string, Entry>();
  private readonly completed = new Map<string, Entry>();
  private readonly cancelled = new Set<string>();
  private readonly claims = new Set<string>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(id: string, fields: NewJobFields): Job {
    if (this.active.has(id) || this.completed.has(id)) {
      throw new Error(`Job already exists: ${id}`);
    }

    const timestamp = this.now().toISOString();
    const job: Job = {
      id,
      status: "queued",
      stage: "Queued",
      tasks: fields.tasks.map((task) => ({ ...task })),
      progress: { current: 0, total: 0, percentage: 0 },
      outputs: {},
      request: structuredClone(fields.request),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.seq += 1;
    this.active.set(id, { job, seq: this.seq });
    return structuredClone(job);
  }

  /** Returns false when the job is not active (unknown or already archived). */
  update(id: string, mutator: JobMutator): boolean {
    const entry = this.active.get(id);
    if (!entry) {
      return false;
    }

    const patch = mutator(structuredClone(entry.job));
    const nextStatus = patch.status ?? entry.job.status;
    if (!canTransition(entry.job.status, nextStatus)) {
      throw new Error(`Illegal status transition for job ${id}: ${entry.job.status} -> ${nextStatus}`);
    }

    entry.job = {
      ...entry.job,
      ...structuredClone(patch),
      updatedAt: this.now().toISOString(),
    };
    return true;
  }

  get(id: string): Job | undefined {
    const entry = this.active.get(id) ?? this.completed.get(id);
    return entry ? structuredClone(entry.job) : undefined;
  }

  list(): Job[] {
    return [...this.active.values(), ...this.completed.values()]
      .sort((a, b) => b.job.createdAt.localeCompare(a.job.createdAt) || b.seq - a.seq)
      .map((entry) => structuredClone(entry.job));
  }

  markCancelled(id: string): boolean {
    if (!this.active.has(id) && !this.completed.has(id)) {
      return false;
    }
    this.cancelled.add(id);
    return true;
  }

  isCancelled(id: string): boolean {
    return this.cancelled.has(id);
  }

  tokenFor(id: string): CancellationToken {
    return new CancellationToken(() => this.isCancelled(id));
  }

  /** Grants the single writer claim on an active job. */
  claim(id: string): void {
    if (!this.active.has(id)) {
      throw new Error(`Job is not active: ${id}`);
    }
    if (this.claims.has(id)) {
      throw new Error(`Job ${id} is already being processed`);
    }
    this.claims.add(id);
  }

  archive(id: string): void {
    const entry = this.active.get(id);
    if (!entry) {
      return;
    }
    this.active.delete(id);
    this.completed.set(id, entry);
    this.claims.delete(id);
  }

  counts(): { active: number; completed: number } {
    return {
      active: this.active.size,
      completed: this.completed.size,
    };
  }
}
