import type { CardDefinition } from "./cards.js";
import type { DelegateCache } from "./delegates.js";
import type { GameState } from "./state.js";

/** Read-only catalog of card definitions, keyed by card name. */
export interface CardCatalog {
  get(name: string): CardDefinition;
  has(name: string): boolean;
  names(): string[];
}

/**
 * Runtime handle for one game. `state` is the persisted document; the
 * catalog and delegate cache are rebuilt from it when a game is loaded.
 */
export interface Game {
  state: GameState;
  readonly catalog: CardCatalog;
  delegateCache: DelegateCache;
}
