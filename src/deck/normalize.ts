import type { IdMetadata, IdTable } from "./types.js";

/**
 * Maps a card id to the id it counts as a copy of. Ids without an entry, or
 * whose entry names no canonical id, come back unchanged.
 */
export function normalizeId(id: number, table: IdTable): number {
  return table.lookup(id)?.canonicalId ?? id;
}

export function idTableFromMap(entries: ReadonlyMap<number, IdMetadata>): IdTable {
  return { lookup: (id) => entries.get(id) };
}

export const EMPTY_ID_TABLE: IdTable = { lookup: () => undefined };
