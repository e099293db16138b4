import { describe, expect, it, vi } from "vitest";
import { CancellationToken } from "../jobs/cancellation";
import { CancellationSignal } from "../utils/errors";
import { advanceProgress, extractElapsed, monitorProgress, toPercentage } from "../utils/progress";

async function* fromArray(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

describe("extractElapsed", () => {
  it("reads the time marker of an ffmpeg status line", () => {
    expect(
      extractElapsed("frame=  250 fps= 25 q=28.0 size=    512kB time=00:01:02.50 bitrate= 67.1kbits/s speed=1.0x"),
    ).toBe(62.5);
  });

  it("uses the last marker when a line carries several", () => {
    expect(extractElapsed("time=00:00:01.00 time=01:00:00.00")).toBe(3600);
  });

  it("ignores lines without a usable marker", () => {
    expect(extractElapsed("time=N/A bitrate=N/A")).toBeNull();
    expect(extractElapsed("Stream mapping:")).toBeNull();
  });
});

describe("toPercentage", () => {
  it("rounds to one decimal and clamps to 100", () => {
    expect(toPercentage(30, 120)).toBe(25);
    expect(toPercentage(1, 3)).toBe(33.3);
    expect(toPercentage(200, 100)).toBe(100);
  });

  it("has no value when the total is unknown", () => {
    expect(toPercentage(5, 0)).toBeNull();
  });
});

describe("advanceProgress", () => {
  it("never lowers the percentage", () => {
    const next = advanceProgress({ current: 50, total: 100, percentage: 50 }, 40, 100);
    expect(next).toEqual({ current: 40, total: 100, percentage: 50 });
  });

  it("keeps the previous percentage while the total is unknown", () => {
    expect(advanceProgress({ current: 0, total: 0, percentage: 0 }, 1024, 0)).toEqual({
      current: 1024,
      total: 0,
      percentage: 0,
    });
  });
});

describe("monitorProgress", () => {
  it("forwards increasing elapsed times and returns the last one", async () => {
    const onProgress = vi.fn();
    const last = await monitorProgress(
      fromArray(["Duration: 00:00:40.00", "time=00:00:10.00", "time=00:00:05.00", "time=00:00:20.00"]),
      40,
      onProgress,
      CancellationToken.none(),
    );

    expect(last).toBe(20);
    expect(onProgress.mock.calls).toEqual([
      [10, 40],
      [20, 40],
    ]);
  });

  it("forwards the raw elapsed time with a zero total when the duration is unknown", async () => {
    const onProgress = vi.fn();
    const last = await monitorProgress(fromArray(["time=00:00:12.50"]), 0, onProgress, CancellationToken.none());

    expect(last).toBe(12.5);
    expect(onProgress.mock.calls).toEqual([[12.5, 0]]);
  });

  it("stops with a cancellation signal on the next line once cancelled", async () => {
    let cancelled = false;
    const onProgress = vi.fn(() => {
      cancelled = true;
    });

    const run = monitorProgress(
      fromArray(["time=00:00:01.00", "time=00:00:02.00"]),
      10,
      onProgress,
      new CancellationToken(() => cancelled),
    );

    await expect(run).rejects.toBeInstanceOf(CancellationSignal);
    await expect(run).rejects.toThrow("Job cancelled during subtitle processing");
    expect(onProgress).toHaveBeenCalledTimes(1);
  });
});
