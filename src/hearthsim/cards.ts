// HearthSim card database — the card list published by HearthstoneJSON.
//
//   GET https://api.hearthstonejson.com/v1/latest/enUS/cards.json
//
// Only the fields needed to name, cost and de-alias card ids are kept.
// Entries without a cost (hero powers, enchantments, ...) are dropped.

import fetch from "node-fetch";
import type { IdMetadata, Rarity } from "../deck/types.js";

// ── Constants ─────────────────────────────────────────────────────────────────

export const DEFAULT_CARDS_URL =
  "https://api.hearthstonejson.com/v1/latest/enUS/cards.json";
const USER_AGENT = "hearthdeck/1.0";

const RARITIES: Record<string, Rarity> = {
  LEGENDARY: "legendary",
  EPIC: "epic",
  RARE: "rare",
  COMMON: "common",
  FREE: "free",
};

// ── Types ─────────────────────────────────────────────────────────────────────

export interface HearthSimCard {
  dbfId: number;
  name: string;
  cost: number;
  rarity: string;
  collectible: boolean;
  countAsCopyOfDbfId?: number;
}

export class HearthSimError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "HearthSimError";
  }
}

// ── Parsing ───────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toHearthSimCard(value: unknown): HearthSimCard | null {
  if (!isRecord(value)) return null;
  const { dbfId, name, cost, rarity, collectible, countAsCopyOfDbfId } = value;
  if (typeof dbfId !== "number" || typeof cost !== "number") return null;

  const card: HearthSimCard = {
    dbfId,
    name: typeof name === "string" ? name : "",
    cost,
    rarity: typeof rarity === "string" ? rarity : "",
    collectible: collectible === true,
  };
  if (typeof countAsCopyOfDbfId === "number") {
    card.countAsCopyOfDbfId = countAsCopyOfDbfId;
  }
  return card;
}

/**
 * Builds id metadata from the card list. Cards that do not say what they
 * count as a copy of fall back to the lowest id sharing their name and
 * collectibility. Nameless cards get no fallback.
 */
export function buildIdMetadata(cards: HearthSimCard[]): Map<number, IdMetadata> {
  const lowestByName = new Map<string, number>();
  for (const card of cards) {
    if (!card.name) continue;
    const key = `${card.collectible}:${card.name}`;
    const lowest = lowestByName.get(key);
    if (lowest === undefined || card.dbfId < lowest) lowestByName.set(key, card.dbfId);
  }

  const entries = new Map<number, IdMetadata>();
  for (const card of cards) {
    entries.set(card.dbfId, {
      canonicalId:
        card.countAsCopyOfDbfId ??
        (card.name ? lowestByName.get(`${card.collectible}:${card.name}`) : undefined),
      name: card.name,
      cost: card.cost,
      rarity: RARITIES[card.rarity] ?? "noncollectible",
      collectible: card.collectible,
    });
  }
  return entries;
}

// ── Fetch ─────────────────────────────────────────────────────────────────────

export async function fetchHearthSimCards(
  url: string = DEFAULT_CARDS_URL
): Promise<HearthSimCard[]> {
  let res: Awaited<ReturnType<typeof fetch>>;
  try {
    res = await fetch(url, {
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/json",
      },
    });
  } catch (err) {
    throw new HearthSimError(
      `Network error fetching card data: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!res.ok) {
    throw new HearthSimError(`Card data request returned ${res.status}`, res.status);
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch {
    throw new HearthSimError("Failed to parse card data as JSON.");
  }

  if (!Array.isArray(data)) {
    throw new HearthSimError("Card data is not a list of cards.");
  }

  const cards: HearthSimCard[] = [];
  for (const entry of data) {
    const card = toHearthSimCard(entry);
    if (card) cards.push(card);
  }
  return cards;
}
