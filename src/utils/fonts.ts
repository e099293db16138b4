import fs from "node:fs/promises";
import path from "node:path";
import type { FontChoice, FontSettings } from "../types/models";
import { fileExists } from "./storage";

export const GENERIC_FALLBACK_FONT = "Arial";

/**
 * Picks the font name written into the Default style. Whether the font is
 * installed where libass runs is not checked.
 */
export const resolveSubtitleFont = async (settings: FontSettings): Promise<FontChoice> => {
  const bundledPath = path.join(settings.fontsDir, settings.bundledFontFile);
  if (settings.bundledFontFile && (await fileExists(bundledPath))) {
    return {
      name: settings.bundledFontName,
      source: "bundled",
      fontsDir: settings.fontsDir,
    };
  }

  const candidate = settings.candidates.map((name) => name.trim()).find(Boolean);
  if (candidate) {
    return { name: candidate, source: "candidate" };
  }

  return { name: GENERIC_FALLBACK_FONT, source: "fallback" };
};

const escapeXml = (value: string): string => {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
};

export const buildFontConfig = (fontsDir: string, cacheDir: string): string => {
  return [
    '<?xml version="1.0"?>',
    '<!DOCTYPE fontconfig SYSTEM "fonts.dtd">',
    "<fontconfig>",
    `  <dir>${escapeXml(fontsDir)}</dir>`,
    "  <include ignore_missing=\"yes\">/etc/fonts/fonts.conf</include>",
    `  <cachedir>${escapeXml(cacheDir)}</cachedir>`,
    "</fontconfig>",
    "",
  ].join("\n");
};

/** Writes a fontconfig file that adds the bundled fonts directory. */
export const writeFontConfig = async (targetDir: string, fontsDir: string): Promise<string> => {
  const cacheDir = path.join(targetDir, "fontcache");
  await fs.mkdir(cacheDir, { recursive: true });
  const configPath = path.join(targetDir, "fonts.conf");
  await fs.writeFile(configPath, buildFontConfig(fontsDir, cacheDir), "utf-8");
  return configPath;
};
