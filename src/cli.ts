#!/usr/bin/env node
// hearthdeck CLI — prints the cards in a Hearthstone deck code.
//
// Usage:
//   node dist/cli.js AAECAQcG...
//   node dist/cli.js "$(pbpaste)" --mode=Twist
//   node dist/cli.js AAECAQcG... --comp=AAECAR8G...
//
// Card names come from the HearthSim card database; without it the deck is
// still printed, with raw card ids.

import "dotenv/config";
import { parseCliArgs } from "./cli_args.js";
import { loadConfig } from "./config.js";
import { compareDecks, lookupDeck, normalizeDeck } from "./deck/lookup.js";
import { renderDeck, renderDifference } from "./deck/render.js";
import { createHearthSimCache } from "./hearthsim/cache.js";

// ── ANSI colours ──────────────────────────────────────────────────────────────

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";

function dim(s: string) { return `${DIM}${s}${RESET}`; }
function bold(s: string) { return `${BOLD}${s}${RESET}`; }
function red(s: string) { return `${RED}${s}${RESET}`; }

// ── Main ──────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.text) {
    console.log(bold("Usage:") + " hearthdeck <deck code> [--comp=<code>] [--mode=<format>] [--title=<title>]");
    process.exit(1);
  }

  // Decode first: a bad code should fail before the card download.
  const decoded = lookupDeck(args.text, { title: args.title, format: args.mode });
  const decodedOther = args.comp ? lookupDeck(args.comp) : undefined;

  const config = loadConfig();
  const cache = createHearthSimCache(config.cardsUrl, config.refreshMs);

  process.stdout.write(dim("  Loading card data...\r"));
  const table = await cache.ready();
  process.stdout.write("                      \r");

  const deck = normalizeDeck(decoded, table);

  if (decodedOther) {
    const other = normalizeDeck(decodedOther, table);
    console.log(renderDifference(compareDecks(deck, other), table));
  } else {
    console.log(renderDeck(deck, table));
  }
}

main().catch((err) => {
  console.error(red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
