import { describe, expect, it } from "vitest";
import type { SubtitleStyle } from "../types/models";
import { SubtitleError } from "../utils/errors";
import { injectDefaultStyle, isSupportedSubtitle, StyleFormat } from "../utils/subtitles";
import { SAMPLE_ASS } from "./helpers/fakeProcess";

const style: SubtitleStyle = {
  fontName: "Noto Sans Sinhala",
  fontSize: 24,
  primaryColor: "&H00FFFF00",
  outlineColor: "&H00101010",
  bold: true,
  alignment: 2,
  marginL: 20,
  marginR: 20,
  marginV: 30,
};

describe("injectDefaultStyle", () => {
  it("rewrites only the Default style row", () => {
    const before = SAMPLE_ASS.split("\r\n");
    const after = injectDefaultStyle(SAMPLE_ASS, style).split("\r\n");

    expect(after).toHaveLength(before.length);
    expect(after[5]).toBe(
      "Style: Default,Noto Sans Sinhala,24,&H00FFFF00,&H000000FF,&H00101010,&H00000000,-1,0,2,20,20,30,1",
    );
    after.forEach((line, index) => {
      if (index !== 5) {
        expect(line).toBe(before[index]);
      }
    });
  });

  it("writes Bold as 0 when bold is off and accepts the v4 header", () => {
    const content = SAMPLE_ASS.replace("[V4+ Styles]", "[V4 Styles]");
    const lines = injectDefaultStyle(content, { ...style, bold: false }).split("\r\n");
    expect(lines[5]).toBe(
      "Style: Default,Noto Sans Sinhala,24,&H00FFFF00,&H000000FF,&H00101010,&H00000000,0,0,2,20,20,30,1",
    );
  });

  it("fails without a style section", () => {
    expect(() => injectDefaultStyle("[Script Info]\nTitle: x\n", style)).toThrow("Subtitle has no style section");
  });

  it("fails when the style section has no Format line", () => {
    const content = SAMPLE_ASS.split("\r\n")
      .filter((line) => !line.startsWith("Format: Name,"))
      .join("\r\n");
    expect(() => injectDefaultStyle(content, style)).toThrow(SubtitleError);
    expect(() => injectDefaultStyle(content, style)).toThrow("Style section has no Format line");
  });

  it("fails without a Default row", () => {
    const content = SAMPLE_ASS.replace("Style: Default,", "Style: Main,");
    expect(() => injectDefaultStyle(content, style)).toThrow("Style section has no Default style");
  });

  it("fails when the format lacks a rewritten column", () => {
    const content = SAMPLE_ASS.replace(" Alignment,", "");
    expect(() => injectDefaultStyle(content, style)).toThrow(
      "Style format line is missing required fields: Alignment",
    );
  });
});

describe("StyleFormat", () => {
  it("matches field names case-insensitively", () => {
    const format = StyleFormat.parse("Format: name, FONTNAME, Fontsize");
    expect(format.indexOf("Fontname")).toBe(1);
    expect(format.get(["Default", " Arial ", "16"], "fontname")).toBe("Arial");
  });

  it("keeps the whitespace before a replaced value", () => {
    const format = StyleFormat.parse("Format: Name, Fontname");
    const values = ["Default", "  Arial"];
    format.set(values, "Fontname", "Noto Sans");
    expect(values).toEqual(["Default", "  Noto Sans"]);
  });

  it("rejects a line that is not a format line", () => {
    expect(() => StyleFormat.parse("Style: Default,Arial")).toThrow(SubtitleError);
  });
});

describe("isSupportedSubtitle", () => {
  it("accepts the known subtitle extensions in any case", () => {
    expect(isSupportedSubtitle("movie.SRT")).toBe(true);
    expect(isSupportedSubtitle("movie.ssa")).toBe(true);
    expect(isSupportedSubtitle("movie.txt")).toBe(false);
  });
});
