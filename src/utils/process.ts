import { spawn } from "node:child_process";
import { ProcessFailure, type ProcessExit } from "./errors";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface StreamingProcess {
  /** stderr split into lines. Must be drained or the child stalls on a full pipe. */
  lines: AsyncIterable<string>;
  /** Always resolves, spawn failures included. */
  exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): boolean;
  isRunning(): boolean;
}

export interface StreamingOptions {
  env?: Record<string, string>;
}

const STDERR_TAIL_LINES = 12;

export const tailLines = (text: string, count = STDERR_TAIL_LINES): string => {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(-count)
    .join("\n");
};

export async function* splitLines(source: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  let pending = "";
  for await (const chunk of source) {
    pending += typeof chunk === "string" ? chunk : chunk.toString("utf-8");
    const parts = pending.split(/\r\n|\r|\n/);
    pending = parts.pop() ?? "";
    for (const part of parts) {
      yield part;
    }
  }
  if (pending) {
    yield pending;
  }
}

const pushTail = (tail: string[], line: string, limit: number): void => {
  const trimmed = line.trim();
  if (!trimmed) {
    return;
  }
  tail.push(trimmed);
  if (tail.length > limit) {
    tail.shift();
  }
};

/** Passes lines through, keeping the last non-empty ones in `tail`. */
export async function* keepTail(
  source: AsyncIterable<string>,
  tail: string[],
  limit = STDERR_TAIL_LINES,
): AsyncGenerator<string> {
  for await (const line of source) {
    pushTail(tail, line, limit);
    yield line;
  }
}

/** Reads a line stream to the end and returns its last non-empty lines. */
export const drainLines = async (source: AsyncIterable<string>, limit = STDERR_TAIL_LINES): Promise<string[]> => {
  const tail: string[] = [];
  for await (const line of source) {
    pushTail(tail, line, limit);
  }
  return tail;
};

export const runCommand = async (
  command: string,
  args: string[],
): Promise<CommandResult> => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });

    child.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      reject(ProcessFailure.fromExit(command, { code: null, signal: null, error }));
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      reject(ProcessFailure.fromExit(command, { code, signal }, tailLines(stderr)));
    });
  });
};

export const spawnStreaming = (
  command: string,
  args: string[],
  options: StreamingOptions = {},
): StreamingProcess => {
  const child = spawn(command, args, {
    stdio: ["ignore", "ignore", "pipe"],
    env: options.env ? { ...process.env, ...options.env } : process.env,
  });
  child.stderr.setEncoding("utf-8");

  let running = true;
  const exited = new Promise<ProcessExit>((resolve) => {
    child.on("error", (error) => {
      running = false;
      resolve({ code: null, signal: null, error });
    });
    child.on("close", (code, signal) => {
      running = false;
      resolve({ code, signal });
    });
  });

  return {
    lines: splitLines(child.stderr),
    exited,
    kill: (signal: NodeJS.Signals = "SIGTERM") => child.kill(signal),
    isRunning: () => running,
  };
};
