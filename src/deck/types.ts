// Shared types for deck decoding and representation.
//
// Everything here is id-level: card names, costs and rarities only appear
// once a DeckSkeleton is hydrated through an IdTable.

// ── Formats ───────────────────────────────────────────────────────────────────

export type KnownFormat = "standard" | "wild" | "classic" | "twist";

export type Format =
  | { kind: KnownFormat }
  | { kind: "custom"; name: string };

// ── Decoder output ────────────────────────────────────────────────────────────

export interface SideboardPair {
  cardId: number;
  /** The main-deck card this sideboard card belongs to. */
  ownerId: number;
}

export interface RawDeckData {
  format: Format;
  /** The numeric format code exactly as it appeared in the deckstring. */
  formatCode: number;
  heroId: number;
  /** One entry per copy, in stream order. */
  cardIds: number[];
  sideboardCards: SideboardPair[];
}

// ── Card metadata ─────────────────────────────────────────────────────────────

export type Rarity =
  | "legendary"
  | "epic"
  | "rare"
  | "common"
  | "free"
  | "noncollectible";

export interface IdMetadata {
  /** Set when this id is a reprint or variant counted as a copy of another. */
  canonicalId?: number;
  name?: string;
  cost?: number;
  rarity?: Rarity;
  collectible?: boolean;
}

export interface IdTable {
  lookup(id: number): IdMetadata | undefined;
}

// ── Lookup output ─────────────────────────────────────────────────────────────

export interface Sideboard {
  ownerId: number;
  cardIds: number[];
}

export interface DeckSkeleton {
  code: string;
  title?: string;
  format: Format;
  heroId: number;
  cardIds: number[];
  sideboards: Sideboard[];
}

export interface DeckDifference {
  firstCode: string;
  secondCode: string;
  shared: Map<number, number>;
  firstOnly: Map<number, number>;
  secondOnly: Map<number, number>;
}
