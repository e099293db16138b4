export const RESOLUTION_LABELS = ["360p", "480p", "720p", "1080p"] as const;

export type ResolutionLabel = (typeof RESOLUTION_LABELS)[number];

export type JobStatus = "queued" | "processing" | "cancelling" | "completed" | "failed" | "cancelled";

export type TaskStatus = "pending" | "in_progress" | "completed" | "failed";

export type AssetKind = "video" | "subtitle";

export interface Task {
  name: string;
  status: TaskStatus;
}

export interface JobProgress {
  current: number;
  total: number;
  percentage: number;
}

export type SubtitleSource =
  | {
      kind: "url";
      url: string;
    }
  | {
      kind: "file";
      path: string;
    };

export interface JobRequest {
  videoUrl: string;
  subtitle: SubtitleSource;
  resolutions: ResolutionLabel[];
  softSubtitle: boolean;
}

export interface Job {
  id: string;
  status: JobStatus;
  stage: string;
  tasks: Task[];
  progress: JobProgress;
  outputs: Partial<Record<ResolutionLabel, string>>;
  error?: string;
  request: JobRequest;
  createdAt: string;
  updatedAt: string;
}

export interface JobSummary {
  id: string;
  status: JobStatus;
  stage: string;
  percentage: number;
  resolutions: ResolutionLabel[];
  softSubtitle: boolean;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export interface VideoInfo {
  durationSec: number;
  width: number;
  height: number;
  fps: number | null;
  codec: string;
  bitRate: number;
}

export interface SubtitleStyle {
  fontName: string;
  fontSize: number;
  primaryColor: string;
  outlineColor: string;
  bold: boolean;
  alignment: number;
  marginL: number;
  marginR: number;
  marginV: number;
}

export type BaseSubtitleStyle = Omit<SubtitleStyle, "fontName">;

export interface FontSettings {
  fontsDir: string;
  bundledFontFile: string;
  bundledFontName: string;
  candidates: string[];
}

export interface FontChoice {
  name: string;
  source: "bundled" | "candidate" | "fallback";
  fontsDir?: string;
}

export interface BurnInSettings {
  videoCodec: string;
  crf: number;
  preset: string;
  threads: number;
  maxMuxingQueueSize: number;
  lowMemoryMode: boolean;
}

export interface SoftEmbedSettings {
  subtitleCodec: string;
  language: string;
  title: string;
}
