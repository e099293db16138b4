import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { v4 as uuidv4 } from "uuid";
import type { DownloadProgress, Downloader } from "../jobs/types";
import type { AssetKind } from "../types/models";
import { safeJoin } from "../utils/storage";
import { isSupportedSubtitle } from "../utils/subtitles";

const DEFAULT_EXTENSIONS: Record<AssetKind, string> = {
  video: ".mp4",
  subtitle: ".srt",
};

const resolveExtension = (source: string, kind: AssetKind): string => {
  const extension = URL.canParse(source) ? path.extname(new URL(source).pathname).toLowerCase() : "";
  if (kind === "subtitle") {
    return isSupportedSubtitle(`file${extension}`) ? extension : DEFAULT_EXTENSIONS.subtitle;
  }
  return /^\.[a-z0-9]{2,5}$/.test(extension) ? extension : DEFAULT_EXTENSIONS.video;
};

export class HttpDownloader implements Downloader {
  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async fetch(
    source: string,
    destinationDir: string,
    kind: AssetKind,
    onProgress: DownloadProgress,
  ): Promise<string> {
    const response = await this.fetchImpl(source);
    if (!response.ok || !response.body) {
      throw new Error(`Failed to download ${kind}: HTTP ${response.status} for ${source}`);
    }

    const contentLength = Number(response.headers.get("content-length") ?? 0);
    const totalBytes = Number.isFinite(contentLength) ? contentLength : 0;

    await fs.mkdir(destinationDir, { recursive: true });
    const destination = safeJoin(destinationDir, `${kind}_${uuidv4()}${resolveExtension(source, kind)}`);

    let receivedBytes = 0;
    try {
      await pipeline(
        Readable.fromWeb(response.body),
        async function* (chunks: AsyncIterable<Uint8Array>) {
          for await (const chunk of chunks) {
            receivedBytes += chunk.length;
            onProgress(receivedBytes, totalBytes);
            yield chunk;
          }
        },
        createWriteStream(destination),
      );
    } catch (error) {
      await fs.rm(destination, { force: true });
      throw error;
    }

    if (receivedBytes === 0) {
      await fs.rm(destination, { force: true });
      throw new Error(`Downloaded ${kind} is empty: ${source}`);
    }

    console.log(`[downloader] ${kind} saved to ${destination} (${receivedBytes} bytes)`);
    return destination;
  }
}
