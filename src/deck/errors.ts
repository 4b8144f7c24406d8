// Errors raised while turning a deck code into RawDeckData.

export type DeckCodeErrorKind =
  | "MalformedBase64"
  | "TruncatedInput"
  | "Overflow"
  | "UnsupportedFormat";

export class DeckCodeError extends Error {
  constructor(
    message: string,
    public readonly kind: DeckCodeErrorKind,
    public readonly formatCode?: number
  ) {
    super(message);
    this.name = "DeckCodeError";
  }
}

export function truncated(offset: number): DeckCodeError {
  return new DeckCodeError(
    `Deck code ended unexpectedly at byte ${offset}. The code may be incomplete.`,
    "TruncatedInput"
  );
}
