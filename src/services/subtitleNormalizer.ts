import fs from "node:fs/promises";
import path from "node:path";
import type { TranscodeRunner } from "../jobs/types";
import type { BaseSubtitleStyle, FontChoice, FontSettings } from "../types/models";
import { decodeSubtitleBytes, type SubtitleEncoding } from "../utils/encoding";
import { ProcessFailure, SubtitleError } from "../utils/errors";
import { buildConversionArgs } from "../utils/ffmpeg";
import { resolveSubtitleFont, writeFontConfig } from "../utils/fonts";
import { drainLines } from "../utils/process";
import { fileExists, safeJoin } from "../utils/storage";
import { injectDefaultStyle, isStyledTrack } from "../utils/subtitles";

export interface SubtitleNormalizerOptions {
  style: BaseSubtitleStyle;
  fonts: FontSettings;
}

export interface NormalizeOptions {
  workDir: string;
  /** Prefix for every artifact written for this subtitle. */
  baseName: string;
  burnIn: boolean;
}

export interface NormalizedSubtitle {
  path: string;
  encoding: SubtitleEncoding;
  converted: boolean;
  font?: FontChoice;
  fontConfigPath?: string;
}

export class SubtitleNormalizer {
  constructor(
    private readonly transcoder: TranscodeRunner,
    private readonly options: SubtitleNormalizerOptions,
  ) {}

  async validate(subtitlePath: string): Promise<void> {
    let size: number;
    try {
      size = (await fs.stat(subtitlePath)).size;
    } catch {
      throw new SubtitleError(`Subtitle file not found: ${subtitlePath}`);
    }
    if (size === 0) {
      throw new SubtitleError(`Subtitle file is empty: ${subtitlePath}`);
    }
  }

  /** Leaves valid UTF-8 without a byte-order mark where it is; anything else is rewritten. */
  async ensureUtf8(
    sourcePath: string,
    workDir: string,
    baseName: string,
  ): Promise<{ path: string; encoding: SubtitleEncoding }> {
    const decoded = decodeSubtitleBytes(await fs.readFile(sourcePath));
    if (!decoded.changed) {
      return { path: sourcePath, encoding: decoded.encoding };
    }

    await fs.mkdir(workDir, { recursive: true });
    const target = safeJoin(workDir, `${baseName}.utf8${path.extname(sourcePath).toLowerCase()}`);
    await fs.writeFile(target, decoded.text, "utf-8");
    console.log(`[normalizer] re-encoded ${path.basename(sourcePath)} from ${decoded.encoding} to UTF-8`);
    return { path: target, encoding: decoded.encoding };
  }

  async convertToStyledTrack(sourcePath: string, workDir: string, baseName: string): Promise<string> {
    await fs.mkdir(workDir, { recursive: true });
    const target = safeJoin(workDir, `${baseName}.ass`);
    const handle = this.transcoder.run(buildConversionArgs(sourcePath, target));

    const tail = await drainLines(handle.lines);
    const exit = await handle.exited;
    if (exit.error || exit.code !== 0) {
      const failure = ProcessFailure.fromExit("ffmpeg", exit, tail.join("\n"));
      throw new SubtitleError(`Failed to convert subtitle to ASS: ${failure.message}`);
    }
    if (!(await fileExists(target))) {
      throw new SubtitleError("Subtitle conversion did not produce a file");
    }
    return target;
  }

  async applyStyle(assPath: string, workDir: string, baseName: string, font: FontChoice): Promise<string> {
    const content = await fs.readFile(assPath, "utf-8");
    const styled = injectDefaultStyle(content, { ...this.options.style, fontName: font.name });
    await fs.mkdir(workDir, { recursive: true });
    const target = safeJoin(workDir, `${baseName}.styled.ass`);
    await fs.writeFile(target, styled, "utf-8");
    return target;
  }

  async normalize(sourcePath: string, options: NormalizeOptions): Promise<NormalizedSubtitle> {
    await this.validate(sourcePath);
    const utf8 = await this.ensureUtf8(sourcePath, options.workDir, options.baseName);
    if (!options.burnIn) {
      return { path: utf8.path, encoding: utf8.encoding, converted: false };
    }

    const converted = !isStyledTrack(sourcePath);
    const assPath = converted
      ? await this.convertToStyledTrack(utf8.path, options.workDir, options.baseName)
      : utf8.path;

    const font = await resolveSubtitleFont(this.options.fonts);
    const styledPath = await this.applyStyle(assPath, options.workDir, options.baseName, font);
    console.log(`[normalizer] Default style set to font "${font.name}" (${font.source})`);

    const fontConfigPath = font.fontsDir
      ? await writeFontConfig(path.join(options.workDir, `${options.baseName}_fontconfig`), font.fontsDir)
      : undefined;

    return {
      path: styledPath,
      encoding: utf8.encoding,
      converted,
      font,
      fontConfigPath,
    };
  }
}
