// Deckstring encoder used by the tests as a round-trip oracle. Writes the
// same layout the game client does: reserved byte, version 1, format, a hero
// count of 1, the hero, the three card sections, then the sideboard groups.

import { Buffer } from "node:buffer";

export function encodeVarint(value: number): number[] {
  const bytes: number[] = [];
  let v = value;
  while (v > 127) {
    bytes.push((v % 128) | 0x80);
    v = Math.floor(v / 128);
  }
  bytes.push(v);
  return bytes;
}

export interface EncodeInput {
  formatCode: number;
  heroId: number;
  singles?: number[];
  doubles?: number[];
  multiples?: Array<[id: number, copies: number]>;
  /** Each inner list is one group of [cardId, ownerId] pairs. */
  sideboardGroups?: Array<Array<[cardId: number, ownerId: number]>>;
}

export function encodeBytes(input: EncodeInput): number[] {
  const singles = input.singles ?? [];
  const doubles = input.doubles ?? [];
  const multiples = input.multiples ?? [];

  const out = [0x00, ...encodeVarint(1), ...encodeVarint(input.formatCode), 1];
  out.push(...encodeVarint(input.heroId));

  out.push(...encodeVarint(singles.length));
  for (const id of singles) out.push(...encodeVarint(id));
  out.push(...encodeVarint(doubles.length));
  for (const id of doubles) out.push(...encodeVarint(id));
  out.push(...encodeVarint(multiples.length));
  for (const [id, copies] of multiples) out.push(...encodeVarint(id), ...encodeVarint(copies));

  if (input.sideboardGroups) {
    out.push(...encodeVarint(input.sideboardGroups.length));
    for (const group of input.sideboardGroups) {
      out.push(...encodeVarint(group.length));
      for (const [cardId, ownerId] of group) {
        out.push(...encodeVarint(cardId), ...encodeVarint(ownerId));
      }
    }
  }
  return out;
}

export function encodeDeckstring(input: EncodeInput): string {
  return Buffer.from(encodeBytes(input)).toString("base64");
}

export function bytesToCode(bytes: number[]): string {
  return Buffer.from(bytes).toString("base64");
}
