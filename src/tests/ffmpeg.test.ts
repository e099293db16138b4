import { describe, expect, it } from "vitest";
import type { BurnInSettings } from "../types/models";
import { ProcessFailure } from "../utils/errors";
import {
  buildBurnInArgs,
  buildConversionArgs,
  buildEncodeArgs,
  buildSoftEmbedArgs,
  escapeFilterPath,
  parseFrameRate,
} from "../utils/ffmpeg";
import { parseFilter } from "./helpers/filterSyntax";

const burnIn: BurnInSettings = {
  videoCodec: "libx264",
  crf: 23,
  preset: "medium",
  threads: 4,
  maxMuxingQueueSize: 1024,
  lowMemoryMode: false,
};

describe("escapeFilterPath", () => {
  it("turns Windows separators into slashes and escapes the drive colon", () => {
    expect(escapeFilterPath("C:\\Users\\me\\subs.ass", "win32")).toBe("C\\:/Users/me/subs.ass");
  });

  it("escapes colons and closes the quote around a single quote", () => {
    expect(escapeFilterPath("/tmp/it's:here.ass", "linux")).toBe("/tmp/it\\'\\''s\\:here.ass");
  });

  it("doubles a literal backslash once", () => {
    expect(escapeFilterPath("/tmp/a\\b.ass", "linux")).toBe("/tmp/a\\\\b.ass");
  });

  it("leaves plain paths alone", () => {
    expect(escapeFilterPath("/var/data/job_1.ass", "linux")).toBe("/var/data/job_1.ass");
  });
});

describe("burn-in filter parsing", () => {
  const filterFor = (subtitlePath: string, fontsDir?: string): string => {
    const args = buildBurnInArgs({
      inputVideoPath: "/in/video.mp4",
      subtitlePath,
      outputPath: "/out/job_hardsubbed.mp4",
      fontsDir,
      settings: burnIn,
    });
    return args[args.indexOf("-vf") + 1];
  };

  it.each([
    { label: "a colon", subtitlePath: "/srv/a:b/sub.ass" },
    { label: "a single quote", subtitlePath: "/srv/it's/sub.ass" },
    { label: "a backslash", subtitlePath: "/srv/a\\b/sub.ass" },
    { label: "all three together", subtitlePath: "/srv/it's\\a:b/sub.ass" },
    { label: "graph separators and spaces", subtitlePath: "/srv/clips [1],a;b/sub.ass" },
  ])("reads back a path with $label unchanged", ({ subtitlePath }) => {
    const parsed = parseFilter(filterFor(subtitlePath, "/app/it's:fonts"));

    expect(parsed.name).toBe("subtitles");
    expect(parsed.options).toEqual({ filename: subtitlePath, fontsdir: "/app/it's:fonts" });
  });

  it("reads back a Windows drive path with forward slashes", () => {
    const escaped = escapeFilterPath("C:\\media\\it's\\sub.ass", "win32");

    expect(parseFilter(`subtitles=filename='${escaped}'`).options).toEqual({ filename: "C:/media/it's/sub.ass" });
  });
});

describe("parseFrameRate", () => {
  it("divides a fraction", () => {
    expect(parseFrameRate("30000/1001")).toBe(29.97);
    expect(parseFrameRate("25/1")).toBe(25);
  });

  it("returns null for malformed input or a zero denominator", () => {
    expect(parseFrameRate("25/0")).toBeNull();
    expect(parseFrameRate("thirty")).toBeNull();
    expect(parseFrameRate(undefined)).toBeNull();
  });
});

describe("argument builders", () => {
  it("copies streams and tags the subtitle track for soft embedding", () => {
    const args = buildSoftEmbedArgs({
      inputVideoPath: "/in/video.mp4",
      subtitlePath: "/in/subs.srt",
      outputPath: "/out/job_subtitled.mp4",
      settings: { subtitleCodec: "mov_text", language: "eng", title: "English" },
    });

    expect(args).toEqual([
      "-hide_banner",
      "-y",
      "-i",
      "/in/video.mp4",
      "-i",
      "/in/subs.srt",
      "-map",
      "0:v:0",
      "-map",
      "0:a?",
      "-map",
      "1:0",
      "-c:v",
      "copy",
      "-c:a",
      "copy",
      "-c:s",
      "mov_text",
      "-metadata:s:s:0",
      "language=eng",
      "-metadata:s:s:0",
      "title=English",
      "-disposition:s:0",
      "default",
      "/out/job_subtitled.mp4",
    ]);
  });

  it("re-encodes with bounded threads and a muxing queue cap for burn-in", () => {
    const args = buildBurnInArgs({
      inputVideoPath: "/in/video.mp4",
      subtitlePath: "/work/job.styled.ass",
      outputPath: "/out/job_hardsubbed.mp4",
      settings: burnIn,
    });

    expect(args).toEqual([
      "-hide_banner",
      "-y",
      "-i",
      "/in/video.mp4",
      "-vf",
      "subtitles=filename='/work/job.styled.ass'",
      "-c:v",
      "libx264",
      "-crf",
      "23",
      "-preset",
      "medium",
      "-threads",
      "4",
      "-c:a",
      "copy",
      "-max_muxing_queue_size",
      "1024",
      "/out/job_hardsubbed.mp4",
    ]);
  });

  it("adds the fonts directory and low-memory settings", () => {
    const args = buildBurnInArgs({
      inputVideoPath: "/in/video.mp4",
      subtitlePath: "/work/job.styled.ass",
      outputPath: "/out/job_hardsubbed.mp4",
      fontsDir: "/app/fonts",
      settings: { ...burnIn, lowMemoryMode: true },
    });

    expect(args[args.indexOf("-vf") + 1]).toBe("subtitles=filename='/work/job.styled.ass':fontsdir='/app/fonts'");
    expect(args[args.indexOf("-crf") + 1]).toBe("28");
    expect(args[args.indexOf("-preset") + 1]).toBe("veryfast");
    expect(args[args.indexOf("-threads") + 1]).toBe("2");
  });

  it("converts subtitles with an explicit UTF-8 charset", () => {
    expect(buildConversionArgs("/in/subs.srt", "/work/subs.ass")).toEqual([
      "-hide_banner",
      "-y",
      "-sub_charenc",
      "UTF-8",
      "-i",
      "/in/subs.srt",
      "/work/subs.ass",
    ]);
  });

  it("scales renditions by height", () => {
    const args = buildEncodeArgs({
      inputPath: "/work/job.mp4",
      outputPath: "/out/job_480p.mp4",
      height: 480,
      videoCodec: "libx264",
      crf: 23,
      preset: "medium",
      audioCodec: "aac",
      audioBitrate: "128k",
    });

    expect(args[args.indexOf("-vf") + 1]).toBe("scale=-2:480");
    expect(args[args.length - 1]).toBe("/out/job_480p.mp4");
  });
});

describe("ProcessFailure.fromExit", () => {
  it("reports exit code 137 as out of memory", () => {
    const failure = ProcessFailure.fromExit("ffmpeg", { code: 137, signal: null });
    expect(failure.kind).toBe("out_of_memory");
    expect(failure.exitCode).toBe(137);
    expect(failure.message).toBe(
      "ffmpeg exited with code 137 (out of memory: the system killed the process; try soft subtitles or more memory)",
    );
  });

  it("reports SIGKILL as killed", () => {
    const failure = ProcessFailure.fromExit("ffmpeg", { code: null, signal: "SIGKILL" });
    expect(failure.kind).toBe("killed");
    expect(failure.signal).toBe("SIGKILL");
  });

  it("reports exit code 1 as an encoding error with the stderr tail", () => {
    const failure = ProcessFailure.fromExit("ffmpeg", { code: 1, signal: null }, "Invalid data found");
    expect(failure.kind).toBe("encode_error");
    expect(failure.message).toBe(
      "ffmpeg exited with code 1 (encoding error: check the video format and subtitle file): Invalid data found",
    );
  });

  it("reports spawn errors and other exit codes", () => {
    expect(ProcessFailure.fromExit("ffprobe", { code: null, signal: null, error: new Error("ENOENT") }).message).toBe(
      "ffprobe could not be started (ENOENT)",
    );
    expect(ProcessFailure.fromExit("ffmpeg", { code: 2, signal: null }).message).toBe("ffmpeg exited with code 2");
    expect(ProcessFailure.fromExit("ffmpeg", { code: null, signal: "SIGTERM" }).message).toBe(
      "ffmpeg was terminated by SIGTERM",
    );
  });
});
