// Pulls the deck code (and a title, if any) out of text pasted from the game
// client or a deck site. A typical clipboard export looks like:
//
//   ### Big Warrior
//   # Class: Warrior
//   # Format: Standard
//   #
//   # 2x (1) Shield Slam
//   #
//   AAECAQcG...
//   #
//   # To use this deck, copy it to your clipboard and create a new deck in Hearthstone

const TITLE_MARKER = "###";
// A bare "#" would cut titles like "Pirates #1" short.
const COMMENT_MARKER = "# ";
const CODE_PREFIX = "AA";

export interface ExtractedCode {
  title?: string;
  code: string;
}

function extractTitle(text: string): string | undefined {
  const start = text.indexOf(TITLE_MARKER);
  if (start < 0) return undefined;

  // The title never runs past its own line.
  const line = text.slice(start + TITLE_MARKER.length).split(/\r?\n/, 1)[0] ?? "";
  const commentAt = line.indexOf(COMMENT_MARKER);
  const title = (commentAt >= 0 ? line.slice(0, commentAt) : line).trim();
  return title || undefined;
}

export function extractTitleAndCode(text: string): ExtractedCode {
  const title = extractTitle(text);
  const code =
    text.split(/\s+/).find((token) => token.startsWith(CODE_PREFIX)) ??
    text.trim();
  return title === undefined ? { code } : { title, code };
}
