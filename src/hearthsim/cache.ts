// Read-through cache over card id metadata.
//
// Callers see the latest snapshot synchronously through lookup(); ready()
// refreshes the snapshot first when it is missing, empty, or past its TTL.
// Concurrent refreshes share one load.

import type { IdMetadata, IdTable } from "../deck/types.js";
import { buildIdMetadata, fetchHearthSimCards } from "./cards.js";

export const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export interface IdMetadataCacheOptions {
  load: () => Promise<ReadonlyMap<number, IdMetadata>>;
  ttlMs?: number;
  now?: () => number;
}

export class IdMetadataCache implements IdTable {
  private entries: ReadonlyMap<number, IdMetadata> = new Map();
  private loadedAt: number | null = null;
  private inflight: Promise<void> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly options: IdMetadataCacheOptions) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(id: number): IdMetadata | undefined {
    return this.entries.get(id);
  }

  isStale(): boolean {
    return (
      this.loadedAt === null ||
      this.entries.size === 0 ||
      this.now() - this.loadedAt >= this.ttlMs
    );
  }

  async ready(): Promise<IdTable> {
    if (this.isStale()) await this.refresh();
    return this;
  }

  refresh(): Promise<void> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load(): Promise<void> {
    try {
      this.entries = await this.options.load();
      this.loadedAt = this.now();
    } catch (err) {
      // Keep serving the previous snapshot; the next ready() tries again.
      console.warn(
        `⚠ Card metadata refresh failed: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}

export function createHearthSimCache(cardsUrl: string, ttlMs?: number): IdMetadataCache {
  return new IdMetadataCache({
    load: async () => buildIdMetadata(await fetchHearthSimCards(cardsUrl)),
    ttlMs,
  });
}
