import fs from "node:fs/promises";
import path from "node:path";
import type { Encoder, MediaProber } from "../jobs/types";
import type { ResolutionLabel, VideoInfo } from "../types/models";
import { buildEncodeArgs, ffprobeVideo, RESOLUTION_HEIGHTS } from "../utils/ffmpeg";
import { runCommand } from "../utils/process";
import { safeJoin } from "../utils/storage";

export interface EncoderOptions {
  ffmpegPath: string;
  outputDir: string;
  videoCodec: string;
  crf: number;
  preset: string;
  audioCodec: string;
  audioBitrate: string;
}

/** Writes `<input stem>_<label>.mp4` scaled to the label's height. */
export class FfmpegEncoder implements Encoder {
  constructor(private readonly options: EncoderOptions) {}

  async encode(inputPath: string, resolution: ResolutionLabel): Promise<string> {
    const stem = path.basename(inputPath, path.extname(inputPath));
    await fs.mkdir(this.options.outputDir, { recursive: true });
    const outputPath = safeJoin(this.options.outputDir, `${stem}_${resolution}.mp4`);

    console.log(`[encoder] encoding ${resolution} -> ${outputPath}`);
    await runCommand(
      this.options.ffmpegPath,
      buildEncodeArgs({
        inputPath,
        outputPath,
        height: RESOLUTION_HEIGHTS[resolution],
        videoCodec: this.options.videoCodec,
        crf: this.options.crf,
        preset: this.options.preset,
        audioCodec: this.options.audioCodec,
        audioBitrate: this.options.audioBitrate,
      }),
    );
    return outputPath;
  }
}

export class FfprobeProber implements MediaProber {
  constructor(private readonly ffprobePath: string) {}

  probe(videoPath: string): Promise<VideoInfo> {
    return ffprobeVideo(videoPath, this.ffprobePath);
  }
}
