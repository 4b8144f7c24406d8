import { describe, it, expect } from "vitest";
import { renderDeck, renderDifference } from "./render.js";
import { idTableFromMap } from "./normalize.js";
import type { IdMetadata } from "./types.js";

const table = idTableFromMap(
  new Map<number, IdMetadata>([
    [1, { name: "Zap" }],
    [2, { name: "Bolt" }],
    [5, { name: "Spark" }],
  ])
);

describe("renderDeck", () => {
  it("lists cards by name with counts, sideboards and the code", () => {
    const text = renderDeck(
      {
        code: "AAECAQcAAWQByAEF",
        title: "Test Deck",
        format: { kind: "standard" },
        heroId: 7,
        cardIds: [2, 1, 1, 3],
        sideboards: [{ ownerId: 1, cardIds: [5, 5] }],
      },
      table
    );
    expect(text.split("\n")).toEqual([
      "STANDARD deck.",
      "Test Deck",
      "     #3",
      "     Bolt",
      "  2x Zap",
      "Sideboard of Zap:",
      "  2x Spark",
      "AAECAQcAAWQByAEF",
    ]);
  });

  it("orders cards by cost before name, unknown costs last", () => {
    const costed = idTableFromMap(
      new Map<number, IdMetadata>([
        [1, { name: "Alpha", cost: 9 }],
        [2, { name: "Zed", cost: 1 }],
        [3, { name: "Mid", cost: 1 }],
        [4, { name: "Aardvark" }],
      ])
    );
    const text = renderDeck(
      { code: "AA", format: { kind: "wild" }, heroId: 7, cardIds: [4, 1, 2, 3], sideboards: [] },
      costed
    );
    expect(text.split("\n")).toEqual([
      "WILD deck.",
      "     Mid",
      "     Zed",
      "     Alpha",
      "     Aardvark",
      "AA",
    ]);
  });

  it("uses the custom format name in the header", () => {
    const text = renderDeck(
      {
        code: "AA",
        format: { kind: "custom", name: "Duels" },
        heroId: 7,
        cardIds: [],
        sideboards: [],
      },
      table
    );
    expect(text).toBe("DUELS deck.\nAA");
  });
});

describe("renderDifference", () => {
  it("marks each deck's unique cards", () => {
    const text = renderDifference(
      {
        firstCode: "AAECAQcA",
        secondCode: "AAEBAQcA",
        shared: new Map([[1, 1]]),
        firstOnly: new Map([[3, 2]]),
        secondOnly: new Map([[2, 1]]),
      },
      table
    );
    expect(text.split("\n")).toEqual([
      "     Zap",
      "",
      "AAECAQcA",
      "+ 2x #3",
      "",
      "AAEBAQcA",
      "-    Bolt",
    ]);
  });
});
