/**
 * engine.ts
 *
 * Game construction and the action processor. An action runs against a
 * clone of the state document: it is committed when it completes and
 * discarded when anything throws, so a rejected action applies nothing.
 */

import { randomUUID } from "node:crypto";
import type { GameAction } from "./types/actions.js";
import type { EngineConfig } from "./types/config.js";
import { resolveConfig } from "./types/config.js";
import type { CardCatalog, Game } from "./types/game.js";
import type { CardState, GameState } from "./types/state.js";
import type { GameUpdate } from "./types/updates.js";
import type { Side } from "./types/primitives.js";
import { cardIdFor } from "./types/primitives.js";
import type { Deck } from "./deck.js";
import { deckCardNames, validateDeck } from "./deck.js";
import { buildDelegateCache } from "./dispatch.js";
import { EngineInvariantError, IllegalActionError, expectDefined } from "./internal/invariant.js";
import { moduleLogger } from "./logger.js";
import {
  activateAbility,
  drawCardAction,
  gainManaAction,
  initiateRaidAction,
  levelUpRoom,
  playCard,
} from "./rules/play.js";
import { beginTurn, dealOpeningHands, endTurn } from "./rules/turns.js";
import { handleRaidAction } from "./rules/raid/core.js";
import { legalActions } from "./rules/legalActions.js";

const log = moduleLogger("engine");

export interface GameOptions {
  catalog: CardCatalog;
  overlordDeck: Deck;
  championDeck: Deck;
  overlordId: string;
  championId: string;
  gameId?: string;
  config?: Partial<EngineConfig>;
  /** Seed for deck shuffling; omit for Math.random */
  seed?: number;
}

export type ActionResult =
  | { ok: true; game: Game }
  | { ok: false; reason: "illegal_action" | "rejected"; message: string };

function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffle<T>(arr: T[], rng?: () => number): T[] {
  const copy = [...arr];
  const random = rng ?? Math.random;
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = expectDefined(copy[i], `engine.shuffle missing value at index ${i}`);
    const target = expectDefined(copy[j], `engine.shuffle missing value at index ${j}`);
    copy[i] = target;
    copy[j] = current;
  }
  return copy;
}

function newCard(id: string, name: string, side: Side, sortingKey: number): CardState {
  return {
    id,
    name,
    side,
    position: { kind: "deck_unknown", side },
    sortingKey,
    data: { revealed: false, cardLevel: 0, boostCount: 0, storedMana: 0, abilityState: {} },
  };
}

/**
 * Cards for one side. Ids follow the deck listing; sorting keys follow the
 * shuffled order, so the lowest key is the top of the deck.
 */
function createSideCards(catalog: CardCatalog, side: Side, deck: Deck, firstKey: number, rng?: () => number): CardState[] {
  const validation = validateDeck(catalog, side, deck);
  if (!validation.valid) {
    throw new EngineInvariantError(`invalid ${side} deck: ${validation.errors.join("; ")}`);
  }

  const [identityName, ...names] = deckCardNames(deck);
  const identity = newCard(cardIdFor(side, 0), expectDefined(identityName, "engine.createSideCards identity"), side, firstKey);
  identity.position = { kind: "identity", side };
  identity.data.revealed = true;

  const cards = names.map((name, index) => newCard(cardIdFor(side, index + 1), name, side, 0));
  shuffle(cards, rng).forEach((card, index) => {
    card.sortingKey = firstKey + 1 + index;
  });
  return [identity, ...cards];
}

/** Build a new game: shuffled decks, opening hands dealt, the Overlord's first turn begun. */
export function createGame(options: GameOptions): Game {
  const config = resolveConfig(options.config);
  const rng = options.seed !== undefined ? mulberry32(options.seed) : undefined;

  const overlordCards = createSideCards(options.catalog, "overlord", options.overlordDeck, 0, rng);
  const championCards = createSideCards(options.catalog, "champion", options.championDeck, overlordCards.length, rng);
  const cards = [...overlordCards, ...championCards];

  const state: GameState = {
    id: options.gameId ?? randomUUID(),
    config,
    players: {
      overlord: { id: options.overlordId, mana: config.startingMana, actions: 0, score: 0, prompt: null },
      champion: { id: options.championId, mana: config.startingMana, actions: 0, score: 0, prompt: null },
    },
    cards,
    raid: null,
    nextRaidId: 1,
    nextSortingKey: cards.length,
    turn: { side: "overlord", turnNumber: 0 },
    phase: "play",
    winner: null,
    updates: [],
  };

  const game = loadGame(state, options.catalog);
  dealOpeningHands(game);
  beginTurn(game, "overlord");
  log.info("game created", { gameId: state.id, cards: cards.length });
  return game;
}

/** Wrap a stored state document; every card name must exist in `catalog`. */
export function loadGame(state: GameState, catalog: CardCatalog): Game {
  for (const card of state.cards) {
    catalog.get(card.name);
  }
  return { state, catalog, delegateCache: buildDelegateCache(state, catalog) };
}

function performAction(game: Game, side: Side, action: GameAction): void {
  if (game.state.phase !== "play") {
    throw new IllegalActionError("The game is over");
  }

  switch (action.type) {
    case "DRAW_CARD":
      drawCardAction(game, side);
      return;
    case "GAIN_MANA":
      gainManaAction(game, side);
      return;
    case "PLAY_CARD":
      playCard(game, side, action.cardId, action.room);
      return;
    case "ACTIVATE_ABILITY":
      activateAbility(game, side, action.abilityId, action.room);
      return;
    case "LEVEL_UP_ROOM":
      levelUpRoom(game, side, action.room);
      return;
    case "INITIATE_RAID":
      initiateRaidAction(game, side, action.room);
      return;
    case "RAID_ACTION":
      handleRaidAction(game, side, action.action);
      return;
    case "END_TURN":
      endTurn(game, side);
      return;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Apply one action for `side`. On success the returned game holds the new
 * state; on failure the input game is untouched.
 */
export function applyAction(game: Game, side: Side, action: GameAction): ActionResult {
  const draft: Game = { state: structuredClone(game.state), catalog: game.catalog, delegateCache: game.delegateCache };

  try {
    performAction(draft, side, action);
    return { ok: true, game: draft };
  } catch (error) {
    if (error instanceof IllegalActionError) {
      log.debug("illegal action", { gameId: game.state.id, side, action: action.type, message: error.message });
      return { ok: false, reason: "illegal_action", message: error.message };
    }
    log.warn("action rejected", { gameId: game.state.id, side, action: action.type, error: errorMessage(error) });
    return { ok: false, reason: "rejected", message: errorMessage(error) };
  }
}

/** Remove and return the pending update records. */
export function drainUpdates(game: Game): GameUpdate[] {
  return game.state.updates.splice(0);
}

export interface Engine {
  getState(): GameState;
  legalActions(side: Side): GameAction[];
  submit(side: Side, action: GameAction): ActionResult;
  drainUpdates(): GameUpdate[];
}

export function createEngine(options: GameOptions): Engine {
  let game = createGame(options);

  return {
    getState: () => game.state,
    legalActions: (side: Side) => legalActions(game, side),
    submit: (side: Side, action: GameAction) => {
      const result = applyAction(game, side, action);
      if (result.ok) {
        game = result.game;
      }
      return result;
    },
    drainUpdates: () => drainUpdates(game),
  };
}
