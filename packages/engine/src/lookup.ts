import type { CardDefinition } from "./types/cards.js";
import type { Game } from "./types/game.js";
import type { AbilityState, CardPosition, CardState, GameState, PlayerState, RaidData } from "./types/state.js";
import type { AbilityId, CardId, RoomId, Side } from "./types/primitives.js";
import { EngineInvariantError, expectDefined } from "./internal/invariant.js";

export function findCard(state: GameState, cardId: CardId): CardState {
  return expectDefined(
    state.cards.find((card) => card.id === cardId),
    `lookup.findCard unknown card ${cardId}`,
  );
}

export function definitionOf(game: Game, cardId: CardId): CardDefinition {
  return game.catalog.get(findCard(game.state, cardId).name);
}

export function player(state: GameState, side: Side): PlayerState {
  return state.players[side];
}

export function activeRaid(state: GameState): RaidData {
  if (state.raid === null) {
    throw new EngineInvariantError("expected an active raid");
  }
  return state.raid;
}

export function abilityState(state: GameState, abilityId: AbilityId): AbilityState | undefined {
  return findCard(state, abilityId.cardId).data.abilityState[abilityId.index];
}

function bySortingKey(a: CardState, b: CardState): number {
  return a.sortingKey - b.sortingKey;
}

/** Cards matching `predicate`, lowest sorting key first */
export function cardsWhere(state: GameState, predicate: (position: CardPosition, card: CardState) => boolean): CardState[] {
  return state.cards.filter((card) => predicate(card.position, card)).sort(bySortingKey);
}

/** Minions defending `room`, outermost (most recently placed) first */
export function defenders(state: GameState, room: RoomId): CardState[] {
  return cardsWhere(
    state,
    (position) => position.kind === "room" && position.room === room && position.location === "defender",
  ).reverse();
}

export function occupants(state: GameState, room: RoomId): CardState[] {
  return cardsWhere(
    state,
    (position) => position.kind === "room" && position.room === room && position.location === "occupant",
  );
}

export function hand(state: GameState, side: Side): CardState[] {
  return cardsWhere(state, (position) => position.kind === "hand" && position.side === side);
}

/** Deck cards in draw order: a known top card first, then the rest by sorting key */
export function deck(state: GameState, side: Side): CardState[] {
  const top = cardsWhere(state, (position) => position.kind === "deck_top" && position.side === side);
  const rest = cardsWhere(state, (position) => position.kind === "deck_unknown" && position.side === side);
  return [...top, ...rest];
}

export function discardPile(state: GameState, side: Side): CardState[] {
  return cardsWhere(state, (position) => position.kind === "discard_pile" && position.side === side);
}

export function weapons(state: GameState): CardState[] {
  return cardsWhere(state, (position) => position.kind === "arena_item" && position.location === "weapons");
}

export function identity(state: GameState, side: Side): CardState | undefined {
  return state.cards.find((card) => card.position.kind === "identity" && card.side === side);
}
