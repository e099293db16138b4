import { describe, expect, it } from "vitest";
import { jobRequestSchema, parseListField, submitBodySchema, subtitleStyleSchema } from "../utils/validators";

describe("job request validation", () => {
  const valid = {
    videoUrl: "https://media.example.test/clip.mp4",
    subtitle: { kind: "file", path: "/uploads/clip.srt" },
    resolutions: ["360p", "1080p"],
    softSubtitle: false,
  };

  it("accepts a complete request", () => {
    expect(jobRequestSchema.safeParse(valid).success).toBe(true);
  });

  it("rejects non-http subtitle URLs and unknown source kinds", () => {
    expect(
      jobRequestSchema.safeParse({ ...valid, subtitle: { kind: "url", url: "file:///tmp/clip.srt" } }).success,
    ).toBe(false);
    expect(jobRequestSchema.safeParse({ ...valid, subtitle: { kind: "s3", key: "a" } }).success).toBe(false);
  });

  it("rejects unexpected keys in the HTTP body", () => {
    expect(
      submitBodySchema.safeParse({
        videoUrl: "https://media.example.test/clip.mp4",
        subtitleUrl: "https://media.example.test/clip.srt",
        priority: 1,
      }).success,
    ).toBe(false);
  });
});

describe("parseListField", () => {
  it("splits comma lists and reads JSON arrays", () => {
    expect(parseListField(" 360p, 720p ")).toEqual(["360p", "720p"]);
    expect(parseListField('["480p","1080p"]')).toEqual(["480p", "1080p"]);
  });

  it("returns undefined for a blank field and keeps malformed JSON for validation", () => {
    expect(parseListField("   ")).toBeUndefined();
    expect(parseListField(undefined)).toBeUndefined();
    expect(parseListField("[720p")).toEqual(["[720p"]);
  });
});

describe("subtitle style validation", () => {
  const style = {
    fontSize: 20,
    primaryColor: "&H00FFFFFF",
    outlineColor: "&H00000000",
    bold: false,
    alignment: 2,
    marginL: 10,
    marginR: 10,
    marginV: 20,
  };

  it("accepts ASS colours and numpad alignments", () => {
    expect(subtitleStyleSchema.safeParse(style).success).toBe(true);
  });

  it("rejects hex colours and out of range alignment", () => {
    expect(subtitleStyleSchema.safeParse({ ...style, primaryColor: "#ffffff" }).success).toBe(false);
    expect(subtitleStyleSchema.safeParse({ ...style, alignment: 10 }).success).toBe(false);
  });
});
