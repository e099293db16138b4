import type { AssetKind, ResolutionLabel, VideoInfo } from "../types/models";
import type { StreamingOptions, StreamingProcess } from "../utils/process";

export type DownloadProgress = (receivedBytes: number, totalBytes: number) => void;

export interface Downloader {
  fetch(source: string, destinationDir: string, kind: AssetKind, onProgress: DownloadProgress): Promise<string>;
}

export interface Encoder {
  encode(inputPath: string, resolution: ResolutionLabel): Promise<string>;
}

export interface TranscodeRunner {
  run(args: string[], options?: StreamingOptions): StreamingProcess;
}

export interface MediaProber {
  probe(videoPath: string): Promise<VideoInfo>;
}
