// Runtime configuration, read from the environment (.env is loaded by the CLI).

import { DEFAULT_CARDS_URL } from "./hearthsim/cards.js";

const DEFAULT_REFRESH_HOURS = 168;

export interface Config {
  cardsUrl: string;
  refreshMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const hours = parseFloat(env.HEARTHSIM_REFRESH_HOURS ?? "");
  return {
    cardsUrl: env.HEARTHSIM_CARDS_URL || DEFAULT_CARDS_URL,
    refreshMs: (hours > 0 ? hours : DEFAULT_REFRESH_HOURS) * 60 * 60 * 1000,
  };
}
