import {
  DEFAULT_CONFIG,
  applyAction,
  cardIdFor,
  loadGame,
  type CardPosition,
  type CardState,
  type Game,
  type GameAction,
  type Side,
} from "@ravenhold/engine";
import { createCatalog } from "../index.js";

export interface StagedCard {
  name: string;
  side: Side;
  position: CardPosition;
  revealed?: boolean;
  storedMana?: number;
}

/**
 * A champion-turn game with the given cards in place, numbered `side:n` per
 * side in list order. Both players start with 10 mana and 3 actions.
 */
export function stage(cards: StagedCard[]): Game {
  const counters: Record<Side, number> = { overlord: 0, champion: 0 };
  const states = cards.map((card, index): CardState => {
    const id = cardIdFor(card.side, counters[card.side]);
    counters[card.side] += 1;
    return {
      id,
      name: card.name,
      side: card.side,
      position: card.position,
      sortingKey: index,
      data: {
        revealed: card.revealed ?? false,
        cardLevel: 0,
        boostCount: 0,
        storedMana: card.storedMana ?? 0,
        abilityState: {},
      },
    };
  });

  return loadGame(
    {
      id: "staged",
      config: DEFAULT_CONFIG,
      players: {
        overlord: { id: "overlord-player", mana: 10, actions: 3, score: 0, prompt: null },
        champion: { id: "champion-player", mana: 10, actions: 3, score: 0, prompt: null },
      },
      cards: states,
      raid: null,
      nextRaidId: 1,
      nextSortingKey: states.length,
      turn: { side: "champion", turnNumber: 1 },
      phase: "play",
      winner: null,
      updates: [],
    },
    createCatalog(),
  );
}

export const artifact = (name: string, storedMana = 0): StagedCard => ({
  name,
  side: "champion",
  position: { kind: "arena_item", location: "artifacts" },
  revealed: true,
  storedMana,
});

/** Apply an action that must succeed and return the resulting game. */
export function act(game: Game, side: Side, action: GameAction): Game {
  const result = applyAction(game, side, action);
  if (!result.ok) {
    throw new Error(`${action.type} failed: ${result.message}`);
  }
  return result.game;
}
