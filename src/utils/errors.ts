import type { ZodIssue } from "zod";

export class ValidationError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class SubtitleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubtitleError";
  }
}

export type ProcessFailureKind = "out_of_memory" | "killed" | "encode_error" | "spawn_error";

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export class ProcessFailure extends Error {
  constructor(
    message: string,
    readonly kind: ProcessFailureKind,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
  ) {
    super(message);
    this.name = "ProcessFailure";
  }

  static fromExit(command: string, exit: ProcessExit, detail?: string): ProcessFailure {
    const suffix = detail ? `: ${detail}` : "";

    if (exit.error) {
      return new ProcessFailure(
        `${command} could not be started (${exit.error.message})${suffix}`,
        "spawn_error",
        exit.code,
        exit.signal,
      );
    }
    if (exit.code === 137) {
      return new ProcessFailure(
        `${command} exited with code 137 (out of memory: the system killed the process; try soft subtitles or more memory)${suffix}`,
        "out_of_memory",
        exit.code,
        exit.signal,
      );
    }
    if (exit.signal === "SIGKILL") {
      return new ProcessFailure(
        `${command} was killed by SIGKILL (likely out of memory; try soft subtitles or more memory)${suffix}`,
        "killed",
        exit.code,
        exit.signal,
      );
    }
    if (exit.code === 1) {
      return new ProcessFailure(
        `${command} exited with code 1 (encoding error: check the video format and subtitle file)${suffix}`,
        "encode_error",
        exit.code,
        exit.signal,
      );
    }

    const reason = exit.signal ? `was terminated by ${exit.signal}` : `exited with code ${exit.code}`;
    return new ProcessFailure(`${command} ${reason}${suffix}`, "encode_error", exit.code, exit.signal);
  }
}

/** Raised at a checkpoint when the job was asked to stop. Not a failure. */
export class CancellationSignal extends Error {
  constructor(readonly stage: string) {
    super(`Job cancelled during ${stage}`);
    this.name = "CancellationSignal";
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
