import type { CancellationToken } from "../jobs/cancellation";
import type { JobProgress } from "../types/models";

export type ProgressCallback = (elapsedSec: number, totalSec: number) => void;

const TIME_MARKER = /time=(\d+):([0-5]\d):([0-5]\d(?:\.\d+)?)/g;

export const parseTimestamp = (hours: string, minutes: string, seconds: string): number => {
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
};

/** Seconds of the last `time=HH:MM:SS.ff` marker in the line, or null. */
export const extractElapsed = (line: string): number | null => {
  let elapsed: number | null = null;
  for (const match of line.matchAll(TIME_MARKER)) {
    elapsed = parseTimestamp(match[1], match[2], match[3]);
  }
  return elapsed;
};

/** Null when the total is unknown. */
export const toPercentage = (current: number, total: number): number | null => {
  if (!Number.isFinite(total) || total <= 0) {
    return null;
  }
  const ratio = Math.max(0, Math.min(1, current / total));
  return Math.round(ratio * 1000) / 10;
};

export const startProgress = (total = 0): JobProgress => ({ current: 0, total, percentage: 0 });

/** Next progress value within one stage; the percentage never goes down. */
export const advanceProgress = (previous: JobProgress, current: number, total: number): JobProgress => {
  const percentage = toPercentage(current, total);
  return {
    current,
    total,
    percentage: percentage === null ? previous.percentage : Math.max(previous.percentage, percentage),
  };
};

/**
 * Reads ffmpeg status lines until the stream closes, forwarding each new
 * elapsed time. Checks the token on every line. Returns the last elapsed
 * time seen; detecting the process exit is left to the caller.
 */
export const monitorProgress = async (
  lines: AsyncIterable<string>,
  totalSec: number,
  onProgress: ProgressCallback,
  token: CancellationToken,
  stage = "subtitle processing",
): Promise<number> => {
  let lastElapsed = 0;

  for await (const line of lines) {
    token.throwIfCancellationRequested(stage);

    const elapsed = extractElapsed(line);
    if (elapsed === null || elapsed < lastElapsed) {
      continue;
    }
    lastElapsed = elapsed;
    onProgress(elapsed, totalSec > 0 ? totalSec : 0);
  }

  return lastElapsed;
};
