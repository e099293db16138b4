import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";

export const storagePaths = {
  root: env.storageDir,
  downloads: path.join(env.storageDir, "downloads"),
  uploads: path.join(env.storageDir, "uploads"),
  processing: path.join(env.storageDir, "processing"),
  output: path.join(env.storageDir, "output"),
};

export const ensureStorageDirs = async (): Promise<void> => {
  await Promise.all(
    Object.values(storagePaths).map(async (dirPath) => {
      await fs.mkdir(dirPath, { recursive: true });
    }),
  );
};

export const safeJoin = (baseDir: string, filename: string): string => {
  const cleaned = path.basename(filename);
  const outputPath = path.join(baseDir, cleaned);
  const relative = path.relative(baseDir, outputPath);
  if (!cleaned || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error("Invalid filename");
  }
  return outputPath;
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const sanitizeFilename = (filename: string): string => {
  const base = path.basename(filename).replace(/[^A-Za-z0-9._-]/g, "_");
  return base.replace(/^\.+/, "") || "file";
};
