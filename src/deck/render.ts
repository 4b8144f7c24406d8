// Plain-text rendering of hydrated decks, for the CLI.

import { formatLabel } from "./format.js";
import { countIds } from "./lookup.js";
import type { DeckDifference, DeckSkeleton, IdTable } from "./types.js";

interface Row {
  name: string;
  id: number;
  count: number;
  cost: number;
}

function cardName(id: number, table: IdTable): string {
  return table.lookup(id)?.name || `#${id}`;
}

// Cheapest first, then by name; cards without a known cost go last.
function compareRows(a: Row, b: Row): number {
  if (a.cost !== b.cost) return a.cost < b.cost ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.id - b.id;
}

function toRows(counts: Map<number, number>, table: IdTable): Row[] {
  return [...counts]
    .map(([id, count]) => ({
      id,
      count,
      name: cardName(id, table),
      cost: table.lookup(id)?.cost ?? Infinity,
    }))
    .sort(compareRows);
}

// Singles leave the count column blank.
function countLabel(count: number): string {
  return count > 1 ? `${count}x` : "";
}

export function renderDeck(deck: DeckSkeleton, table: IdTable): string {
  const lines = [`${formatLabel(deck.format).toUpperCase()} deck.`];
  if (deck.title) lines.push(deck.title);

  for (const row of toRows(countIds(deck.cardIds), table)) {
    lines.push(`${countLabel(row.count).padStart(4)} ${row.name}`);
  }

  for (const sideboard of deck.sideboards) {
    lines.push(`Sideboard of ${cardName(sideboard.ownerId, table)}:`);
    for (const row of toRows(countIds(sideboard.cardIds), table)) {
      lines.push(`${countLabel(row.count).padStart(4)} ${row.name}`);
    }
  }

  lines.push(deck.code);
  return lines.join("\n");
}

export function renderDifference(diff: DeckDifference, table: IdTable): string {
  const lines: string[] = [];
  for (const row of toRows(diff.shared, table)) {
    lines.push(`${countLabel(row.count).padStart(4)} ${row.name}`);
  }
  lines.push("", diff.firstCode);
  for (const row of toRows(diff.firstOnly, table)) {
    lines.push(`+${countLabel(row.count).padStart(3)} ${row.name}`);
  }
  lines.push("", diff.secondCode);
  for (const row of toRows(diff.secondOnly, table)) {
    lines.push(`-${countLabel(row.count).padStart(3)} ${row.name}`);
  }
  return lines.join("\n");
}
