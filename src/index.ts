export { extractTitleAndCode } from "./deck/code.js";
export type { ExtractedCode } from "./deck/code.js";
export {
  decodeDeckstring,
  FORMAT_OFFSET,
  HERO_OFFSET,
  MIN_DECKSTRING_LENGTH,
} from "./deck/deckstring.js";
export { DeckCodeError } from "./deck/errors.js";
export type { DeckCodeErrorKind } from "./deck/errors.js";
export { formatFromCode, formatLabel, parseFormat } from "./deck/format.js";
export { compareDecks, lookupDeck, normalizeDeck } from "./deck/lookup.js";
export type { LookupOptions } from "./deck/lookup.js";
export { EMPTY_ID_TABLE, idTableFromMap, normalizeId } from "./deck/normalize.js";
export { renderDeck, renderDifference } from "./deck/render.js";
export type * from "./deck/types.js";
export { ByteCursor } from "./deck/varint.js";
export { createHearthSimCache, IdMetadataCache } from "./hearthsim/cache.js";
export type { IdMetadataCacheOptions } from "./hearthsim/cache.js";
export {
  buildIdMetadata,
  fetchHearthSimCards,
  HearthSimError,
} from "./hearthsim/cards.js";
export type { HearthSimCard } from "./hearthsim/cards.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
