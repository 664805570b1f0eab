// Character codec for the engine's in-game text. Only the glyphs the game's font
// actually has are mapped; everything else becomes "?".

export const TEXT_START = 0x00;
export const SPACE = 0x7f;
export const LINE_DOWN = 0x4e;
export const BOTTOM_LINE = 0x4f;
export const TERMINATOR = 0x50;
export const PARAGRAPH = 0x51;
export const SCROLL_LINE = 0x55;
export const END_MSG = 0x57;
export const END_PROMPT = 0x58;

export const QUESTION_MARK = 0xe6;

const UPPER_BASE = 0x80;
const LOWER_BASE = 0xa0;
const DIGIT_BASE = 0xf6;

const PUNCTUATION: Record<string, number> = {
  "(": 0x8a,
  ")": 0x8b,
  ":": 0x8c,
  ";": 0x8d,
  "[": 0x8e,
  "]": 0x8f,
  "'": 0xe0,
  "-": 0xe3,
  "?": 0xe6,
  "!": 0xe7,
  ".": 0xe8,
  "/": 0xf3,
  ",": 0xf4,
};

const CODE_A = 0x41;
const CODE_Z = 0x5a;
const CODE_LOWER_A = 0x61;
const CODE_LOWER_Z = 0x7a;
const CODE_0 = 0x30;
const CODE_9 = 0x39;

export function encodeChar(ch: string): number {
  const code = ch.codePointAt(0) ?? 0;
  if (code >= CODE_A && code <= CODE_Z) return UPPER_BASE + (code - CODE_A);
  if (code >= CODE_LOWER_A && code <= CODE_LOWER_Z) return LOWER_BASE + (code - CODE_LOWER_A);
  if (code >= CODE_0 && code <= CODE_9) return DIGIT_BASE + (code - CODE_0);
  if (ch === " ") return SPACE;
  if (ch === "\n") return LINE_DOWN;
  return PUNCTUATION[ch] ?? QUESTION_MARK;
}

/**
 * Lazily encodes `text`, one byte per character. The returned iterable can be
 * iterated any number of times; each pass starts from the first character.
 */
export function encode(text: string): Iterable<number> {
  return {
    *[Symbol.iterator]() {
      for (const ch of text) yield encodeChar(ch);
    },
  };
}

export function encodeString(text: string): number[] {
  return [...encode(text)];
}

/** Frames `text` as a complete message box: TEXT_START, glyphs, END_MSG, TERMINATOR. */
export function messageBox(text: string): number[] {
  return [TEXT_START, ...encode(text), END_MSG, TERMINATOR];
}

const DECODE_TABLE = buildDecodeTable();

function buildDecodeTable(): Map<number, string> {
  const table = new Map<number, string>();
  for (const [ch, byte] of Object.entries(PUNCTUATION)) table.set(byte, ch);
  // Letters share 0x8A-0x8F with the bracket glyphs; letters win
  for (let i = 0; i < 26; i++) {
    table.set(UPPER_BASE + i, String.fromCharCode(CODE_A + i));
    table.set(LOWER_BASE + i, String.fromCharCode(CODE_LOWER_A + i));
  }
  for (let i = 0; i < 10; i++) table.set(DIGIT_BASE + i, String.fromCharCode(CODE_0 + i));
  table.set(SPACE, " ");
  for (const lineBreak of [LINE_DOWN, BOTTOM_LINE, PARAGRAPH, SCROLL_LINE]) table.set(lineBreak, "\n");
  for (const control of [TEXT_START, END_MSG, END_PROMPT]) table.set(control, "");
  return table;
}

/** Renders engine bytes as a printable string, stopping at the first TERMINATOR. */
export function decode(bytes: Iterable<number>): string {
  let out = "";
  for (const byte of bytes) {
    if (byte === TERMINATOR) break;
    out += DECODE_TABLE.get(byte) ?? "?";
  }
  return out;
}
