import {
  activatedTakeMana,
  encounterBoost,
  endRaid,
  onScoreGainMana,
  storeManaOnPlay,
  strike,
  takeManaAtDusk,
  unveilAtDuskThenStore,
} from "../abilities.js";
import { loadGame } from "../engine.js";
import { actions, cost, eventDelegate, onPlayCard, thisCard } from "../helpers.js";
import { gainMana } from "../mutations.js";
import { buildCatalog } from "../registry.js";
import { DEFAULT_CONFIG, type EngineConfig } from "../types/config.js";
import type { CardDefinition } from "../types/cards.js";
import type { CardCatalog, Game } from "../types/game.js";
import type { CardPosition, CardState, GameState } from "../types/state.js";
import { cardIdFor, type Side } from "../types/primitives.js";

export function overlordIdentity(): CardDefinition {
  return {
    name: "Test Overlord Identity",
    cost: actions(0),
    cardType: "identity",
    side: "overlord",
    rarity: "common",
    abilities: [],
    stats: {},
  };
}

export function championIdentity(): CardDefinition {
  return {
    name: "Test Champion Identity",
    cost: actions(0),
    cardType: "identity",
    side: "champion",
    rarity: "common",
    abilities: [],
    stats: {},
  };
}

/** Weapon: attack 3, breach 1, boost 2 attack for 1 mana */
export function testBlade(): CardDefinition {
  return {
    name: "Test Blade",
    cost: cost(1),
    cardType: "weapon",
    side: "champion",
    rarity: "common",
    abilities: [encounterBoost()],
    stats: { attack: 3, breach: 1, attackBoost: { cost: 1, bonus: 2 } },
  };
}

/** Weapon: attack 1, no boost */
export function testClub(): CardDefinition {
  return {
    name: "Test Club",
    cost: cost(0),
    cardType: "weapon",
    side: "champion",
    rarity: "common",
    abilities: [],
    stats: { attack: 1 },
  };
}

export function testCache(): CardDefinition {
  return {
    name: "Test Cache",
    cost: cost(2),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [storeManaOnPlay(6), activatedTakeMana(2, actions(1))],
    stats: {},
  };
}

/** Spell: gain 3 mana */
export function testWindfall(): CardDefinition {
  return {
    name: "Test Windfall",
    cost: cost(1),
    cardType: "champion_spell",
    side: "champion",
    rarity: "common",
    abilities: [
      {
        text: "Gain 3 mana.",
        abilityType: { type: "standard" },
        delegates: [
          onPlayCard(thisCard, (game, scope) => {
            gainMana(game, scope.side, 3);
          }),
        ],
      },
    ],
    stats: {},
  };
}

/** Minion: summon 3, health 10, shield 2, ends the raid */
export function testSentinel(): CardDefinition {
  return {
    name: "Test Sentinel",
    cost: cost(3),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [endRaid()],
    stats: { health: 10, shield: 2 },
  };
}

/** Minion: summon 1, health 2, strike 1 */
export function testBrute(): CardDefinition {
  return {
    name: "Test Brute",
    cost: cost(1),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [strike(1)],
    stats: { health: 2 },
  };
}

/** Scheme: level 2 for 3 points, gain 4 mana when scored */
export function testScheme(): CardDefinition {
  return {
    name: "Test Scheme",
    cost: actions(1),
    cardType: "scheme",
    side: "overlord",
    rarity: "common",
    abilities: [onScoreGainMana(4)],
    stats: { schemePoints: { levelRequirement: 2, points: 3 } },
  };
}

/** Project: unveil for 2 at dusk and store 6, take 2 each dusk */
export function testMine(): CardDefinition {
  return {
    name: "Test Mine",
    cost: cost(2),
    cardType: "project",
    side: "overlord",
    rarity: "common",
    abilities: [unveilAtDuskThenStore(6), takeManaAtDusk(2)],
    stats: {},
  };
}

export const TEST_CARD_CONSTRUCTORS: ReadonlyArray<() => CardDefinition> = [
  overlordIdentity,
  championIdentity,
  testBlade,
  testClub,
  testCache,
  testWindfall,
  testSentinel,
  testBrute,
  testScheme,
  testMine,
];

export function testCatalog(extra: ReadonlyArray<() => CardDefinition> = []): CardCatalog {
  return buildCatalog([...TEST_CARD_CONSTRUCTORS, ...extra]);
}

/** A card event recorder: an artifact whose delegates append to `log`. */
export function recorderCard(name: string, log: string[]): () => CardDefinition {
  return () => ({
    name,
    cost: cost(0),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [
      {
        text: "Records events.",
        abilityType: { type: "standard" },
        delegates: [
          eventDelegate("onMoveCard", () => true, (_game, _scope, data) => {
            log.push(`move:${data.cardId}`);
          }),
          eventDelegate("onDrawCard", () => true, (_game, _scope, cardId) => {
            log.push(`draw:${cardId}`);
          }),
          eventDelegate("onPlayCard", () => true, (_game, _scope, cardId) => {
            log.push(`play:${cardId}`);
          }),
          eventDelegate("onStoredManaTaken", () => true, (_game, _scope, cardId) => {
            log.push(`taken:${cardId}`);
          }),
          eventDelegate("onEncounterBegin", () => true, (_game, _scope, data) => {
            log.push(`encounter:${data.defenderId}`);
          }),
          eventDelegate("onEncounterEnd", () => true, (_game, _scope, raidId) => {
            log.push(`encounterEnd:${raidId}`);
          }),
          eventDelegate("onRaidFailure", () => true, (_game, _scope, raidId) => {
            log.push(`failure:${raidId}`);
          }),
          eventDelegate("onRaidSuccess", () => true, (_game, _scope, raidId) => {
            log.push(`success:${raidId}`);
          }),
          eventDelegate("onRaidEnd", () => true, (_game, _scope, data) => {
            log.push(`end:${data.raidId}:${data.outcome}`);
          }),
        ],
      },
    ],
    stats: {},
  });
}

export interface Placement {
  name: string;
  side: Side;
  position: CardPosition;
  revealed?: boolean;
  storedMana?: number;
}

export interface TestGameOptions {
  config?: Partial<EngineConfig>;
  turn?: Side;
  mana?: number;
  actions?: number;
}

/**
 * A game with cards exactly where `placements` puts them. Ids are
 * `side:n`, numbered per side in placement order; sorting keys follow
 * placement order.
 */
export function buildTestGame(catalog: CardCatalog, placements: Placement[], options: TestGameOptions = {}): Game {
  const counters: Record<Side, number> = { overlord: 0, champion: 0 };
  const cards: CardState[] = placements.map((placement, index) => {
    const id = cardIdFor(placement.side, counters[placement.side]);
    counters[placement.side] += 1;
    return {
      id,
      name: placement.name,
      side: placement.side,
      position: placement.position,
      sortingKey: index,
      data: {
        revealed: placement.revealed ?? false,
        cardLevel: 0,
        boostCount: 0,
        storedMana: placement.storedMana ?? 0,
        abilityState: {},
      },
    };
  });

  const mana = options.mana ?? 10;
  const actionPoints = options.actions ?? 3;
  const state: GameState = {
    id: "test-game",
    config: { ...DEFAULT_CONFIG, ...options.config },
    players: {
      overlord: { id: "overlord-player", mana, actions: actionPoints, score: 0, prompt: null },
      champion: { id: "champion-player", mana, actions: actionPoints, score: 0, prompt: null },
    },
    cards,
    raid: null,
    nextRaidId: 1,
    nextSortingKey: placements.length,
    turn: { side: options.turn ?? "overlord", turnNumber: 1 },
    phase: "play",
    winner: null,
    updates: [],
  };
  return loadGame(state, catalog);
}
