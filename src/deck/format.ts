// Game format codes and user-supplied format overrides.

import type { Format, KnownFormat } from "./types.js";

// ── Constants ─────────────────────────────────────────────────────────────────

// Numeric codes as written by the game client.
const FORMAT_CODES: ReadonlyMap<number, KnownFormat> = new Map<number, KnownFormat>([
  [1, "wild"],
  [2, "standard"],
  [3, "classic"],
  [4, "twist"],
]);

const FORMAT_ALIASES: ReadonlyMap<string, KnownFormat> = new Map<string, KnownFormat>([
  ["standard", "standard"],
  ["std", "standard"],
  ["wild", "wild"],
  ["classic", "classic"],
  ["twist", "twist"],
]);

const LABELS: Record<KnownFormat, string> = {
  standard: "Standard",
  wild: "Wild",
  classic: "Classic",
  twist: "Twist",
};

// ── Exports ───────────────────────────────────────────────────────────────────

export function formatFromCode(code: number): Format | undefined {
  const kind = FORMAT_CODES.get(code);
  return kind ? { kind } : undefined;
}

/**
 * Parses a format override such as "Wild" or "Tavern Brawl".
 * Anything that is not a known format name is kept as a custom format.
 */
export function parseFormat(text: string): Format {
  const name = text.trim();
  const kind = FORMAT_ALIASES.get(name.toLowerCase());
  return kind ? { kind } : { kind: "custom", name };
}

export function formatLabel(format: Format): string {
  return format.kind === "custom" ? format.name : LABELS[format.kind];
}
