import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { DEFAULT_CARDS_URL } from "./hearthsim/cards.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      cardsUrl: DEFAULT_CARDS_URL,
      refreshMs: 168 * 60 * 60 * 1000,
    });
  });

  it("reads the cards URL and refresh interval", () => {
    expect(
      loadConfig({
        HEARTHSIM_CARDS_URL: "https://cards.test/cards.json",
        HEARTHSIM_REFRESH_HOURS: "2",
      })
    ).toEqual({ cardsUrl: "https://cards.test/cards.json", refreshMs: 7_200_000 });
  });

  it("ignores non-numeric and non-positive refresh intervals", () => {
    expect(loadConfig({ HEARTHSIM_REFRESH_HOURS: "soon" }).refreshMs).toBe(604_800_000);
    expect(loadConfig({ HEARTHSIM_REFRESH_HOURS: "0" }).refreshMs).toBe(604_800_000);
  });
});
