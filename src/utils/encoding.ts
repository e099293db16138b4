import { SubtitleError } from "./errors";

export type SubtitleEncoding =
  | "utf-8"
  | "utf-8-bom"
  | "utf-16le"
  | "utf-16be"
  | "windows-1252"
  | "windows-1251"
  | "iso-8859-1";

export interface DecodedText {
  text: string;
  encoding: SubtitleEncoding;
  /** False only when the input already was UTF-8 without a byte-order mark. */
  changed: boolean;
}

interface Candidate {
  encoding: SubtitleEncoding;
  applies: (bytes: Buffer) => boolean;
  decode: (bytes: Buffer) => string | null;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];
const UTF16LE_BOM = [0xff, 0xfe];
const UTF16BE_BOM = [0xfe, 0xff];

// Replacement character or C1 controls: bytes a legacy code page leaves undefined.
const UNDEFINED_IN_CODE_PAGE = /[\u0080-\u009f\ufffd]/;

const startsWith = (bytes: Buffer, marker: number[]): boolean => {
  return bytes.length >= marker.length && marker.every((value, index) => bytes[index] === value);
};

const strictDecode = (label: string, bytes: Buffer): string | null => {
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
};

const codePageDecode = (label: string, bytes: Buffer): string | null => {
  const text = strictDecode(label, bytes);
  if (text === null || UNDEFINED_IN_CODE_PAGE.test(text)) {
    return null;
  }
  return text;
};

const CANDIDATES: Candidate[] = [
  {
    encoding: "utf-8-bom",
    applies: (bytes) => startsWith(bytes, UTF8_BOM),
    decode: (bytes) => strictDecode("utf-8", bytes),
  },
  {
    encoding: "utf-8",
    applies: (bytes) => !startsWith(bytes, UTF8_BOM),
    decode: (bytes) => strictDecode("utf-8", bytes),
  },
  {
    encoding: "utf-16le",
    applies: (bytes) => startsWith(bytes, UTF16LE_BOM),
    decode: (bytes) => strictDecode("utf-16le", bytes),
  },
  {
    encoding: "utf-16be",
    applies: (bytes) => startsWith(bytes, UTF16BE_BOM),
    decode: (bytes) => strictDecode("utf-16be", bytes),
  },
  {
    encoding: "windows-1252",
    applies: () => true,
    decode: (bytes) => codePageDecode("windows-1252", bytes),
  },
  {
    encoding: "windows-1251",
    applies: () => true,
    decode: (bytes) => codePageDecode("windows-1251", bytes),
  },
  {
    encoding: "iso-8859-1",
    applies: () => true,
    decode: (bytes) => bytes.toString("latin1"),
  },
];

export const decodeSubtitleBytes = (bytes: Buffer): DecodedText => {
  for (const candidate of CANDIDATES) {
    if (!candidate.applies(bytes)) {
      continue;
    }
    const text = candidate.decode(bytes);
    if (text !== null) {
      return {
        text,
        encoding: candidate.encoding,
        changed: candidate.encoding !== "utf-8",
      };
    }
  }

  throw new SubtitleError("Unable to detect subtitle encoding");
};
