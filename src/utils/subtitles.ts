import path from "node:path";
import type { SubtitleStyle } from "../types/models";
import { SubtitleError } from "./errors";

export const SUBTITLE_EXTENSIONS = [".srt", ".ass", ".vtt", ".sub", ".ssa"] as const;

const STYLE_SECTION_HEADERS = new Set(["[v4+ styles]", "[v4 styles]"]);

/** Style record columns this service is allowed to rewrite. */
export const STYLE_COLUMNS: ReadonlyArray<readonly [keyof SubtitleStyle, string]> = [
  ["fontName", "Fontname"],
  ["fontSize", "Fontsize"],
  ["primaryColor", "PrimaryColour"],
  ["outlineColor", "OutlineColour"],
  ["bold", "Bold"],
  ["alignment", "Alignment"],
  ["marginL", "MarginL"],
  ["marginR", "MarginR"],
  ["marginV", "MarginV"],
];

export const isStyledTrack = (filePath: string): boolean => {
  return path.extname(filePath).toLowerCase() === ".ass";
};

export const isSupportedSubtitle = (filename: string): boolean => {
  const extension = path.extname(filename).toLowerCase();
  return SUBTITLE_EXTENSIONS.some((allowed) => allowed === extension);
};

/**
 * Column layout declared by a `Format:` line. Field names match
 * case-insensitively; any number of columns is accepted.
 */
export class StyleFormat {
  private constructor(
    readonly fields: string[],
    private readonly columns: Map<string, number>,
  ) {}

  static parse(formatLine: string): StyleFormat {
    const separator = formatLine.indexOf(":");
    if (separator < 0 || formatLine.slice(0, separator).trim().toLowerCase() !== "format") {
      throw new SubtitleError(`Invalid style format line: ${formatLine}`);
    }

    const fields = formatLine
      .slice(separator + 1)
      .split(",")
      .map((field) => field.trim());
    const columns = new Map<string, number>();
    fields.forEach((field, index) => {
      if (field && !columns.has(field.toLowerCase())) {
        columns.set(field.toLowerCase(), index);
      }
    });

    if (!columns.has("name")) {
      throw new SubtitleError("Style format line has no Name field");
    }
    return new StyleFormat(fields, columns);
  }

  has(field: string): boolean {
    return this.columns.has(field.toLowerCase());
  }

  requireFields(fields: string[]): void {
    const missing = fields.filter((field) => !this.has(field));
    if (missing.length) {
      throw new SubtitleError(`Style format line is missing required fields: ${missing.join(", ")}`);
    }
  }

  indexOf(field: string): number {
    const index = this.columns.get(field.toLowerCase());
    if (index === undefined) {
      throw new SubtitleError(`Style format line has no ${field} field`);
    }
    return index;
  }

  get(values: string[], field: string): string {
    return (values[this.indexOf(field)] ?? "").trim();
  }

  /** Replaces a column's value, keeping the whitespace that preceded it. */
  set(values: string[], field: string, value: string): void {
    const index = this.indexOf(field);
    const leading = /^\s*/.exec(values[index] ?? "")?.[0] ?? "";
    values[index] = `${leading}${value}`;
  }
}

const toStyleValues = (style: SubtitleStyle): Record<keyof SubtitleStyle, string> => ({
  fontName: style.fontName,
  fontSize: String(style.fontSize),
  primaryColor: style.primaryColor,
  outlineColor: style.outlineColor,
  bold: style.bold ? "-1" : "0",
  alignment: String(style.alignment),
  marginL: String(style.marginL),
  marginR: String(style.marginR),
  marginV: String(style.marginV),
});

const splitRecord = (line: string): { prefix: string; values: string[] } | null => {
  const separator = line.indexOf(":");
  if (separator < 0 || line.slice(0, separator).trim().toLowerCase() !== "style") {
    return null;
  }
  return {
    prefix: line.slice(0, separator + 1),
    values: line.slice(separator + 1).split(","),
  };
};

/**
 * Rewrites the font, colour, weight, alignment and margin columns of every
 * `Default` style row. All other rows and columns are left byte-identical.
 */
export const injectDefaultStyle = (content: string, style: SubtitleStyle): string => {
  const lines = content.split("\n");
  const bare = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line);

  const sectionStart = lines.findIndex((line) => STYLE_SECTION_HEADERS.has(bare(line).trim().toLowerCase()));
  if (sectionStart < 0) {
    throw new SubtitleError("Subtitle has no style section");
  }

  let sectionEnd = lines.length;
  for (let index = sectionStart + 1; index < lines.length; index += 1) {
    if (bare(lines[index]).trim().startsWith("[")) {
      sectionEnd = index;
      break;
    }
  }

  let format: StyleFormat | undefined;
  for (let index = sectionStart + 1; index < sectionEnd; index += 1) {
    if (/^\s*format\s*:/i.test(bare(lines[index]))) {
      format = StyleFormat.parse(bare(lines[index]));
      break;
    }
  }
  if (!format) {
    throw new SubtitleError("Style section has no Format line");
  }

  format.requireFields(STYLE_COLUMNS.map(([, field]) => field));

  const values = toStyleValues(style);
  let rewritten = 0;

  for (let index = sectionStart + 1; index < sectionEnd; index += 1) {
    const line = lines[index];
    const record = splitRecord(bare(line));
    if (!record || format.get(record.values, "Name").toLowerCase() !== "default") {
      continue;
    }
    if (record.values.length < format.fields.length) {
      throw new SubtitleError(
        `Default style has ${record.values.length} columns, format declares ${format.fields.length}`,
      );
    }

    for (const [key, field] of STYLE_COLUMNS) {
      format.set(record.values, field, values[key]);
    }
    const ending = line.endsWith("\r") ? "\r" : "";
    lines[index] = `${record.prefix}${record.values.join(",")}${ending}`;
    rewritten += 1;
  }

  if (!rewritten) {
    throw new SubtitleError("Style section has no Default style");
  }
  return lines.join("\n");
};
