import type { TranscodeRunner } from "../jobs/types";
import type {
  BurnInSettings,
  ResolutionLabel,
  SoftEmbedSettings,
  VideoInfo,
} from "../types/models";
import { runCommand, spawnStreaming, type StreamingOptions, type StreamingProcess } from "./process";

interface ProbeStream {
  codec_type?: string;
  codec_name?: string;
  width?: number;
  height?: number;
  r_frame_rate?: string;
}

interface ProbeFormat {
  duration?: string;
  bit_rate?: string;
}

interface ProbePayload {
  streams?: ProbeStream[];
  format?: ProbeFormat;
}

export const RESOLUTION_HEIGHTS: Record<ResolutionLabel, number> = {
  "360p": 360,
  "480p": 480,
  "720p": 720,
  "1080p": 1080,
};

const LOW_MEMORY_BURN_IN = {
  preset: "veryfast",
  crf: 28,
  threads: 2,
};

/** Parses `num/den`; null when malformed or the denominator is zero. */
export const parseFrameRate = (raw?: string): number | null => {
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(raw ?? "");
  if (!match) {
    return null;
  }
  const num = Number.parseInt(match[1], 10);
  const den = Number.parseInt(match[2], 10);
  if (den === 0) {
    return null;
  }
  return Number((num / den).toFixed(3));
};

/**
 * Escapes a path for a single-quoted filter argument. The graph parser strips
 * the quotes, so the value keeps one escape level for the option parser
 * (`\\`, `\:`, `\'`). A `'` also closes the quote, escapes itself and reopens.
 * On Windows the separators become `/` first.
 */
export const escapeFilterPath = (value: string, platform: NodeJS.Platform = process.platform): string => {
  const normalized = platform === "win32" ? value.replace(/\\/g, "/") : value;
  return normalized
    .replace(/\\/g, "\\\\")
    .replace(/:/g, "\\:")
    .replace(/'/g, "\\'\\''");
};

export const resolveBurnInSettings = (settings: BurnInSettings): BurnInSettings => {
  if (!settings.lowMemoryMode) {
    return settings;
  }
  return {
    ...settings,
    ...LOW_MEMORY_BURN_IN,
  };
};

export const buildSoftEmbedArgs = (params: {
  inputVideoPath: string;
  subtitlePath: string;
  outputPath: string;
  settings: SoftEmbedSettings;
}): string[] => {
  return [
    "-hide_banner",
    "-y",
    "-i",
    params.inputVideoPath,
    "-i",
    params.subtitlePath,
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
    params.settings.subtitleCodec,
    "-metadata:s:s:0",
    `language=${params.settings.language}`,
    "-metadata:s:s:0",
    `title=${params.settings.title}`,
    "-disposition:s:0",
    "default",
    params.outputPath,
  ];
};

export const buildBurnInArgs = (params: {
  inputVideoPath: string;
  subtitlePath: string;
  outputPath: string;
  fontsDir?: string;
  settings: BurnInSettings;
}): string[] => {
  const settings = resolveBurnInSettings(params.settings);
  const filterArgs = [`filename='${escapeFilterPath(params.subtitlePath)}'`];
  if (params.fontsDir) {
    filterArgs.push(`fontsdir='${escapeFilterPath(params.fontsDir)}'`);
  }

  return [
    "-hide_banner",
    "-y",
    "-i",
    params.inputVideoPath,
    "-vf",
    `subtitles=${filterArgs.join(":")}`,
    "-c:v",
    settings.videoCodec,
    "-crf",
    String(settings.crf),
    "-preset",
    settings.preset,
    "-threads",
    String(settings.threads),
    "-c:a",
    "copy",
    "-max_muxing_queue_size",
    String(settings.maxMuxingQueueSize),
    params.outputPath,
  ];
};

export const buildConversionArgs = (inputPath: string, outputPath: string): string[] => {
  return ["-hide_banner", "-y", "-sub_charenc", "UTF-8", "-i", inputPath, outputPath];
};

export const buildEncodeArgs = (params: {
  inputPath: string;
  outputPath: string;
  height: number;
  videoCodec: string;
  crf: number;
  preset: string;
  audioCodec: string;
  audioBitrate: string;
}): string[] => {
  return [
    "-hide_banner",
    "-y",
    "-i",
    params.inputPath,
    "-map",
    "0:v:0",
    "-map",
    "0:a?",
    "-map",
    "0:s?",
    "-vf",
    `scale=-2:${params.height}`,
    "-c:v",
    params.videoCodec,
    "-crf",
    String(params.crf),
    "-preset",
    params.preset,
    "-c:a",
    params.audioCodec,
    "-b:a",
    params.audioBitrate,
    "-c:s",
    "copy",
    "-movflags",
    "+faststart",
    params.outputPath,
  ];
};

export const createFfmpegRunner = (ffmpegPath: string): TranscodeRunner => ({
  run: (args: string[], options?: StreamingOptions): StreamingProcess => {
    console.log(`[ffmpeg] ${ffmpegPath} ${args.join(" ")}`);
    return spawnStreaming(ffmpegPath, args, options);
  },
});

export const ffprobeVideo = async (inputPath: string, ffprobePath = "ffprobe"): Promise<VideoInfo> => {
  const { stdout } = await runCommand(ffprobePath, [
    "-v",
    "error",
    "-show_entries",
    "format=duration,bit_rate:stream=codec_type,codec_name,width,height,r_frame_rate",
    "-of",
    "json",
    inputPath,
  ]);

  const parsed = JSON.parse(stdout) as ProbePayload;
  const videoStream = parsed.streams?.find((stream) => stream.codec_type === "video");
  if (!videoStream) {
    throw new Error("No video stream found");
  }

  const durationSec = Number(parsed.format?.duration ?? 0);
  const bitRate = Number(parsed.format?.bit_rate ?? 0);

  return {
    durationSec: Number.isFinite(durationSec) ? durationSec : 0,
    width: videoStream.width ?? 0,
    height: videoStream.height ?? 0,
    fps: parseFrameRate(videoStream.r_frame_rate),
    codec: videoStream.codec_name ?? "unknown",
    bitRate: Number.isFinite(bitRate) ? bitRate : 0,
  };
};
