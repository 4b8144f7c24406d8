// Deck lookup — pasted text in, normalized DeckSkeleton out.
//
// This is the whole pipeline short of hydration: extract the code, decode it,
// apply any title/format overrides, and fold aliased card ids onto their
// canonical ids.

import { extractTitleAndCode } from "./code.js";
import { decodeDeckstring } from "./deckstring.js";
import { parseFormat } from "./format.js";
import { EMPTY_ID_TABLE, normalizeId } from "./normalize.js";
import type {
  DeckDifference,
  DeckSkeleton,
  IdTable,
  Sideboard,
  SideboardPair,
} from "./types.js";

export interface LookupOptions {
  /** Replaces any title found in the pasted text. */
  title?: string;
  /** Replaces the decoded format, e.g. "Twist" or "Tavern Brawl". */
  format?: string;
  table?: IdTable;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function groupSideboards(
  pairs: SideboardPair[],
  normalize: (id: number) => number
): Sideboard[] {
  const byOwner = new Map<number, number[]>();
  for (const { cardId, ownerId } of pairs) {
    const owner = normalize(ownerId);
    const cards = byOwner.get(owner) ?? [];
    cards.push(normalize(cardId));
    byOwner.set(owner, cards);
  }
  return [...byOwner].map(([ownerId, cardIds]) => ({ ownerId, cardIds }));
}

export function countIds(ids: number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const id of ids) counts.set(id, (counts.get(id) ?? 0) + 1);
  return counts;
}

// ── Main exports ──────────────────────────────────────────────────────────────

export function lookupDeck(text: string, options: LookupOptions = {}): DeckSkeleton {
  const extracted = extractTitleAndCode(text);
  const raw = decodeDeckstring(extracted.code);
  const normalize = (id: number) => normalizeId(id, options.table ?? EMPTY_ID_TABLE);

  const title = options.title ?? extracted.title;
  const format = options.format?.trim();
  const deck: DeckSkeleton = {
    code: extracted.code,
    format: format ? parseFormat(format) : raw.format,
    heroId: raw.heroId,
    cardIds: raw.cardIds.map(normalize),
    sideboards: groupSideboards(raw.sideboardCards, normalize),
  };
  if (title !== undefined) deck.title = title;
  return deck;
}

/**
 * Re-normalizes an already decoded deck, e.g. once card metadata has been
 * downloaded after the code was checked.
 */
export function normalizeDeck(deck: DeckSkeleton, table: IdTable): DeckSkeleton {
  const normalize = (id: number) => normalizeId(id, table);
  const pairs = deck.sideboards.flatMap(({ ownerId, cardIds }) =>
    cardIds.map((cardId) => ({ cardId, ownerId }))
  );
  return {
    ...deck,
    cardIds: deck.cardIds.map(normalize),
    sideboards: groupSideboards(pairs, normalize),
  };
}

/** Multiset comparison of two decks' main-deck cards. */
export function compareDecks(first: DeckSkeleton, second: DeckSkeleton): DeckDifference {
  const a = countIds(first.cardIds);
  const b = countIds(second.cardIds);

  const shared = new Map<number, number>();
  const firstOnly = new Map<number, number>();
  const secondOnly = new Map<number, number>();

  for (const [id, countA] of a) {
    const countB = b.get(id) ?? 0;
    const common = Math.min(countA, countB);
    if (common > 0) shared.set(id, common);
    if (countA > common) firstOnly.set(id, countA - common);
  }
  for (const [id, countB] of b) {
    const countA = a.get(id) ?? 0;
    if (countB > countA) secondOnly.set(id, countB - countA);
  }

  return { firstCode: first.code, secondCode: second.code, shared, firstOnly, secondOnly };
}
