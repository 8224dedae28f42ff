/**
 * helpers.ts
 *
 * Requirements and delegate builders used by card definitions.
 */

import type {
  AbilityActivated,
  EncounterEvent,
  EventData,
  EventDelegateOf,
  EventKind,
  QueryDelegateOf,
  QueryInput,
  QueryKind,
  QueryResult,
  Scope,
} from "./types/delegates.js";
import type { Game } from "./types/game.js";
import type { CardCost } from "./types/cards.js";
import type { BoostData, CardId, RaidId } from "./types/primitives.js";
import { abilityState, findCard } from "./lookup.js";
import { inPlay } from "./positions.js";
import { setAbilityState } from "./mutations.js";

export type Requirement<T> = (game: Game, scope: Scope, data: T) => boolean;
export type Mutation<T> = (game: Game, scope: Scope, data: T) => void;
export type Transformation<T, R> = (game: Game, scope: Scope, data: T, current: R) => R;

// ── Requirements ─────────────────────────────────────────────────

export function always(): boolean {
  return true;
}

/** The event concerns the card that owns this ability */
export function thisCard(_game: Game, scope: Scope, cardId: CardId): boolean {
  return scope.cardId === cardId;
}

export function thisBoost(_game: Game, scope: Scope, data: BoostData): boolean {
  return scope.cardId === data.cardId;
}

/** The card that owns this ability is in play and revealed */
export function faceUpInPlay(game: Game, scope: Scope): boolean {
  const card = findCard(game.state, scope.cardId);
  return card.data.revealed && inPlay(card.position);
}

export function faceDownInPlay(game: Game, scope: Scope): boolean {
  const card = findCard(game.state, scope.cardId);
  return !card.data.revealed && inPlay(card.position);
}

/** This ability saved the id of the raid in question */
export function matchingRaid(game: Game, scope: Scope, raidId: RaidId): boolean {
  return abilityState(game.state, scope.abilityId)?.raidId === raidId;
}

/** The minion being encountered or defeated is the card that owns this ability */
export function thisDefender(_game: Game, scope: Scope, data: EncounterEvent): boolean {
  return scope.cardId === data.defenderId;
}

export function thisAbilityActivated(_game: Game, scope: Scope, data: AbilityActivated): boolean {
  return data.abilityId.cardId === scope.abilityId.cardId && data.abilityId.index === scope.abilityId.index;
}

// ── Delegate builders ────────────────────────────────────────────

export function eventDelegate<K extends EventKind>(
  kind: K,
  requirement: Requirement<EventData[K]>,
  mutation: Mutation<EventData[K]>,
): EventDelegateOf<K> {
  return { family: "event", kind, requirement, mutation };
}

export function queryDelegate<K extends QueryKind>(
  kind: K,
  requirement: Requirement<QueryInput[K]>,
  transformation: Transformation<QueryInput[K], QueryResult[K]>,
): QueryDelegateOf<K> {
  return { family: "query", kind, requirement, transformation };
}

export function onPlayCard(requirement: Requirement<CardId>, mutation: Mutation<CardId>): EventDelegateOf<"onPlayCard"> {
  return eventDelegate("onPlayCard", requirement, mutation);
}

/** Runs at the start of the Overlord's turn while this card is face-up in play */
export function atDusk(mutation: Mutation<number>): EventDelegateOf<"onDusk"> {
  return eventDelegate("onDusk", faceUpInPlay, mutation);
}

/** Runs when this specific ability is activated */
export function onActivated(mutation: Mutation<AbilityActivated>): EventDelegateOf<"onActivateAbility"> {
  return eventDelegate("onActivateAbility", thisAbilityActivated, mutation);
}

export function onScoreCard(mutation: Mutation<CardId>): EventDelegateOf<"onScoreCard"> {
  return eventDelegate("onScoreCard", thisCard, mutation);
}

export function onRaidSuccess(
  requirement: Requirement<RaidId>,
  mutation: Mutation<RaidId>,
): EventDelegateOf<"onRaidSuccess"> {
  return eventDelegate("onRaidSuccess", requirement, mutation);
}

export function onRaidAccessStart(
  requirement: Requirement<RaidId>,
  mutation: Mutation<RaidId>,
): EventDelegateOf<"onRaidAccessStart"> {
  return eventDelegate("onRaidAccessStart", requirement, mutation);
}

export function onMinionCombatAbility(mutation: Mutation<EncounterEvent>): EventDelegateOf<"onMinionCombatAbility"> {
  return eventDelegate("onMinionCombatAbility", thisDefender, mutation);
}

export function addVaultAccess(amount: number, requirement: Requirement<RaidId>): QueryDelegateOf<"vaultAccessCount"> {
  return queryDelegate("vaultAccessCount", requirement, (_game, _scope, _raidId, current) => current + amount);
}

export function addSanctumAccess(
  amount: number,
  requirement: Requirement<RaidId>,
): QueryDelegateOf<"sanctumAccessCount"> {
  return queryDelegate("sanctumAccessCount", requirement, (_game, _scope, _raidId, current) => current + amount);
}

// ── Ability state ────────────────────────────────────────────────

/** Remember `raidId` so later raid events can be matched with matchingRaid */
export function saveRaidId(game: Game, scope: Scope, raidId: RaidId): void {
  setAbilityState(game, scope.abilityId, { raidId });
}

/** Run `mutation` unless this ability already ran during the current turn */
export function oncePerTurn<T>(game: Game, scope: Scope, data: T, mutation: Mutation<T>): void {
  const turnNumber = game.state.turn.turnNumber;
  if (abilityState(game.state, scope.abilityId)?.turnNumber === turnNumber) return;
  setAbilityState(game, scope.abilityId, { turnNumber });
  mutation(game, scope, data);
}

// ── Costs ────────────────────────────────────────────────────────

export function cost(mana: number, actionCount = 1): CardCost {
  return { mana, actions: actionCount };
}

/** Cost of cards and abilities that are never paid for with mana */
export function actions(count: number): CardCost {
  return { actions: count };
}
