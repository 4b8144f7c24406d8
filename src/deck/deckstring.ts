// Deckstring decoder — converts a base64 deck code into RawDeckData.
//
// Layout (positional, not self-describing):
//
//   [0..1]   reserved header, ignored
//   [2]      varint  format code
//   [4]      varint  hero card id
//            varint  N1, then N1 card ids              (one copy each)
//            varint  N2, then N2 card ids              (two copies each)
//            varint  N3, then N3 (card id, count)      (count copies each)
//            varint  G,  then G groups of:             (optional)
//                      varint M, then M (card id, owner id)
//
// The format and hero offsets are fixed by the game client's encoder: byte 1
// is the version and byte 3 the hero count, both always one byte in practice.
// They are read at those offsets rather than walked through.

import { Buffer } from "node:buffer";
import { DeckCodeError, truncated } from "./errors.js";
import { formatFromCode } from "./format.js";
import type { RawDeckData, SideboardPair } from "./types.js";
import { ByteCursor } from "./varint.js";

// ── Constants ─────────────────────────────────────────────────────────────────

export const FORMAT_OFFSET = 2;
export const HERO_OFFSET = 4;
/** Reserved header, format and hero: the shortest prefix worth reading. */
export const MIN_DECKSTRING_LENGTH = 5;

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

// ── Helpers ───────────────────────────────────────────────────────────────────

function decodeBase64(code: string): Uint8Array {
  const body = code.replace(/=+$/, "");
  const padded = body.length !== code.length;
  if (
    !BASE64_RE.test(code) ||
    body.length % 4 === 1 ||
    (padded && code.length % 4 !== 0)
  ) {
    throw new DeckCodeError(
      "Deck code is not valid base64.",
      "MalformedBase64"
    );
  }
  return Buffer.from(body, "base64");
}

function repeat(cardIds: number[], id: number, copies: number): void {
  for (let i = 0; i < copies; i++) cardIds.push(id);
}

function readSideboards(cursor: ByteCursor): SideboardPair[] {
  const pairs: SideboardPair[] = [];
  // A code that stops after the main deck simply has no sideboards.
  if (cursor.atEnd) return pairs;

  const groups = cursor.readSmallVarint();
  for (let g = 0; g < groups; g++) {
    const members = cursor.readSmallVarint();
    for (let m = 0; m < members; m++) {
      const cardId = cursor.readVarint();
      const ownerId = cursor.readVarint();
      pairs.push({ cardId, ownerId });
    }
  }
  return pairs;
}

// ── Main export ───────────────────────────────────────────────────────────────

/**
 * Decodes a bare deck code. Throws DeckCodeError when the code is not base64,
 * ends early, carries an out-of-range count, or names an unknown format.
 */
export function decodeDeckstring(code: string): RawDeckData {
  const bytes = decodeBase64(code);
  if (bytes.length < MIN_DECKSTRING_LENGTH) throw truncated(bytes.length);

  const cursor = new ByteCursor(bytes);

  cursor.seek(FORMAT_OFFSET);
  const formatCode = cursor.readSmallVarint();
  const format = formatFromCode(formatCode);
  if (!format) {
    throw new DeckCodeError(
      `Unsupported deck format code ${formatCode}.`,
      "UnsupportedFormat",
      formatCode
    );
  }

  cursor.seek(HERO_OFFSET);
  const heroId = cursor.readVarint();

  const cardIds: number[] = [];

  const singles = cursor.readSmallVarint();
  for (let i = 0; i < singles; i++) repeat(cardIds, cursor.readVarint(), 1);

  const doubles = cursor.readSmallVarint();
  for (let i = 0; i < doubles; i++) repeat(cardIds, cursor.readVarint(), 2);

  const multiples = cursor.readSmallVarint();
  for (let i = 0; i < multiples; i++) {
    const id = cursor.readVarint();
    repeat(cardIds, id, cursor.readSmallVarint());
  }

  return {
    format,
    formatCode,
    heroId,
    cardIds,
    sideboardCards: readSideboards(cursor),
  };
}
