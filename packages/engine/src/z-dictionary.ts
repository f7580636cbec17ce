// ─── Z-machine dictionary reader ─────────────────────────────────────────────
//
// The parse dictionary lives at the address stored in header word 0x08:
//
//   n            separator count (byte), followed by n separator bytes
//   entryLength  bytes per entry
//   count        signed 16-bit; negative means "unsorted", same entries
//   entries      encoded text (4 bytes in v1-3, 6 bytes in v4+) + game data
//
// Text is packed three 5-bit z-chars per 16-bit word.
// ─────────────────────────────────────────────────────────────────────────────

const HEADER_SIZE = 64;
const DICTIONARY_ADDR = 0x08;
const ALPHABET_ADDR = 0x34;

const A0 = "abcdefghijklmnopqrstuvwxyz";
const A1 = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
// Index 0 is the ZSCII escape, index 1 a newline (v1 has no newline slot).
const A2 = "  0123456789.,!?_#'\"/\\-:()";
const A2_V1 = " 0123456789.,!?_#'\"/\\<-:()";

type Alphabets = [string, string, string];

function word(bytes: Uint8Array, addr: number): number {
  return ((bytes[addr] ?? 0) << 8) | (bytes[addr + 1] ?? 0);
}

function alphabetsFor(bytes: Uint8Array, version: number): Alphabets {
  const table = version >= 5 ? word(bytes, ALPHABET_ADDR) : 0;
  if (table === 0 || table + 78 > bytes.length) {
    return [A0, A1, version === 1 ? A2_V1 : A2];
  }
  const row = (i: number): string =>
    String.fromCharCode(...bytes.subarray(table + i * 26, table + (i + 1) * 26));
  const a2 = row(2);
  return [row(0), row(1), "  " + a2.slice(2)];
}

/** Unpacks 5-bit z-chars from `wordCount` consecutive words. */
function zchars(bytes: Uint8Array, addr: number, wordCount: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < wordCount; i++) {
    const w = word(bytes, addr + i * 2);
    out.push((w >> 10) & 0x1f, (w >> 5) & 0x1f, w & 0x1f);
  }
  return out;
}

function decode(chars: number[], version: number, alphabets: Alphabets): string {
  let text = "";
  let lock = 0;
  let shift: number | null = null;

  for (let i = 0; i < chars.length; i++) {
    const zc = chars[i] ?? 0;
    const alphabet = shift ?? lock;
    shift = null;

    if (zc === 0) {
      text += " ";
      continue;
    }
    if (version >= 3) {
      if (zc <= 3) { i++; continue; } // abbreviation reference; never used in dictionary words
      if (zc === 4) { shift = 1; continue; }
      if (zc === 5) { shift = 2; continue; }
    } else {
      if (zc === 1) {
        if (version === 1) text += "\n";
        else i++;
        continue;
      }
      if (zc === 2 || zc === 3) { shift = (lock + zc - 1) % 3; continue; }
      if (zc === 4 || zc === 5) { lock = (lock + zc - 3) % 3; continue; }
    }

    if (alphabet === 2 && zc === 6) {
      const hi = chars[i + 1];
      const lo = chars[i + 2];
      i += 2;
      if (hi === undefined || lo === undefined) break;
      text += String.fromCharCode((hi << 5) | lo);
      continue;
    }
    if (alphabet === 2 && zc === 7 && version >= 2) {
      text += "\n";
      continue;
    }
    text += alphabets[alphabet]?.[zc - 6] ?? "";
  }
  return text;
}

/**
 * Reads every word of a story file's parse dictionary, in file order.
 * Throws on anything that does not look like a Z-machine image.
 */
export function readDictionary(bytes: Uint8Array): string[] {
  if (bytes.length < HEADER_SIZE) {
    throw new Error(`Not a Z-machine story file (${bytes.length} bytes)`);
  }
  const version = bytes[0] ?? 0;
  if (version < 1 || version > 8) {
    throw new Error(`Unsupported Z-machine version ${version}`);
  }

  const dict = word(bytes, DICTIONARY_ADDR);
  if (dict < HEADER_SIZE || dict + 4 > bytes.length) {
    throw new Error(`Dictionary address 0x${dict.toString(16)} is outside the story file`);
  }

  const separators = bytes[dict] ?? 0;
  let addr = dict + 1 + separators;
  const entryLength = bytes[addr] ?? 0;
  const rawCount = word(bytes, addr + 1);
  const count = Math.abs(rawCount > 0x7fff ? rawCount - 0x10000 : rawCount);
  addr += 3;

  const textWords = version <= 3 ? 2 : 3;
  if (entryLength < textWords * 2) {
    throw new Error(`Dictionary entry length ${entryLength} is too short for version ${version}`);
  }
  if (addr + count * entryLength > bytes.length) {
    throw new Error(`Dictionary of ${count} entries runs past the end of the story file`);
  }

  const alphabets = alphabetsFor(bytes, version);
  const words: string[] = [];
  for (let i = 0; i < count; i++) {
    const text = decode(zchars(bytes, addr + i * entryLength, textWords), version, alphabets).trim();
    if (text) words.push(text);
  }
  return words;
}
