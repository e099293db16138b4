import path from "node:path";

const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
};

const toList = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
};

const rootDir = path.resolve(__dirname, "..", "..");

const resolveDir = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return path.join(rootDir, fallback);
  }
  return path.isAbsolute(trimmed) ? trimmed : path.resolve(rootDir, trimmed);
};

export const env = {
  port: toNumber(process.env.PORT, 4000),
  frontendOrigin: process.env.FRONTEND_ORIGIN ?? "http://localhost:3000",
  maxUploadSizeMb: toNumber(process.env.MAX_UPLOAD_SIZE_MB, 20),
  ffmpegPath: process.env.FFMPEG_PATH ?? "ffmpeg",
  ffprobePath: process.env.FFPROBE_PATH ?? "ffprobe",
  videoCodec: process.env.VIDEO_CODEC ?? "libx264",
  videoCrf: toNumber(process.env.VIDEO_CRF, 23),
  videoPreset: process.env.VIDEO_PRESET ?? "medium",
  ffmpegThreads: toNumber(process.env.FFMPEG_THREADS, 2),
  maxMuxingQueueSize: toNumber(process.env.MAX_MUXING_QUEUE_SIZE, 1024),
  lowMemoryMode: toBoolean(process.env.LOW_MEMORY_MODE, false),
  audioCodec: process.env.AUDIO_CODEC ?? "aac",
  audioBitrate: process.env.AUDIO_BITRATE ?? "128k",
  subtitleCodec: process.env.SUBTITLE_CODEC ?? "mov_text",
  subtitleLanguage: process.env.SUBTITLE_LANGUAGE ?? "eng",
  subtitleTitle: process.env.SUBTITLE_TITLE ?? "English",
  defaultSoftSubtitle: toBoolean(process.env.DEFAULT_SOFT_SUBTITLE, true),
  defaultResolutions: toList(process.env.DEFAULT_RESOLUTIONS, ["360p", "480p", "720p", "1080p"]),
  killGraceMs: toNumber(process.env.KILL_GRACE_MS, 3000),
  fontsDir: resolveDir(process.env.FONTS_DIR, "fonts"),
  bundledFontFile: process.env.BUNDLED_FONT_FILE ?? "NotoSansSinhala-Regular.ttf",
  bundledFontName: process.env.BUNDLED_FONT_NAME ?? "Noto Sans Sinhala",
  fontCandidates: toList(process.env.SUBTITLE_FONT_CANDIDATES, ["Noto Sans", "DejaVu Sans"]),
  subtitleStyle: {
    fontSize: toNumber(process.env.SUBTITLE_FONT_SIZE, 20),
    primaryColor: process.env.SUBTITLE_PRIMARY_COLOR ?? "&H00FFFFFF",
    outlineColor: process.env.SUBTITLE_OUTLINE_COLOR ?? "&H00000000",
    bold: toBoolean(process.env.SUBTITLE_BOLD, false),
    alignment: toNumber(process.env.SUBTITLE_ALIGNMENT, 2),
    marginL: toNumber(process.env.SUBTITLE_MARGIN_L, 10),
    marginR: toNumber(process.env.SUBTITLE_MARGIN_R, 10),
    marginV: toNumber(process.env.SUBTITLE_MARGIN_V, 20),
  },
  storageDir: resolveDir(process.env.STORAGE_DIR, "storage"),
};
