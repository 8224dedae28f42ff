/**
 * delegates.ts
 *
 * Abilities respond to game events and intercept game queries through
 * delegates. Every delegate is scoped to one ability instance and carries a
 * requirement (guard) plus either a mutation (events) or a transformation
 * (queries). The payload of each kind is fixed by EventData / QueryInput /
 * QueryResult, so dispatch recovers the typed closures by kind.
 */

import type { AttackBoost } from "./cards.js";
import type { Game } from "./game.js";
import type { RaidOutcome } from "./updates.js";
import type { CardPosition } from "./state.js";
import type { AbilityId, BoostData, CardId, RaidId, RoomId, Side } from "./primitives.js";

/** Capability handle for the ability currently executing. */
export interface Scope {
  readonly abilityId: Readonly<AbilityId>;
  readonly cardId: CardId;
  /** Side that owns the card */
  readonly side: Side;
}

export interface CardMoved {
  cardId: CardId;
  oldPosition: CardPosition;
  newPosition: CardPosition;
}

export interface RaidEvent {
  raidId: RaidId;
  target: RoomId;
}

export interface EncounterEvent {
  raidId: RaidId;
  defenderId: CardId;
}

export interface AbilityActivated {
  abilityId: AbilityId;
  room?: RoomId;
}

export interface RaidEnded {
  raidId: RaidId;
  target: RoomId;
  outcome: RaidOutcome;
}

export interface EventData {
  /** Start of the Champion's turn */
  onDawn: number;
  /** Start of the Overlord's turn */
  onDusk: number;
  onMoveCard: CardMoved;
  onDrawCard: CardId;
  onPlayCard: CardId;
  onRevealCard: CardId;
  onStoredManaTaken: CardId;
  onActivateAbility: AbilityActivated;
  onLevelUp: CardId;
  onScoreCard: CardId;
  onRaidBegin: RaidEvent;
  onRaidStart: RaidEvent;
  onRaidActivation: RaidEvent;
  onEncounterBegin: EncounterEvent;
  onActivateBoost: BoostData;
  onMinionDefeated: EncounterEvent;
  onMinionCombatAbility: EncounterEvent;
  onEncounterEnd: RaidId;
  onRaidAccessStart: RaidId;
  onRaidSuccess: RaidId;
  onRaidFailure: RaidId;
  onRaidEnd: RaidEnded;
}

export type EventKind = keyof EventData;

export interface QueryInput {
  manaCost: CardId;
  abilityManaCost: AbilityId;
  actionCost: CardId;
  attackValue: CardId;
  healthValue: CardId;
  shieldValue: CardId;
  breachValue: CardId;
  attackBoost: CardId;
  boostCount: CardId;
  startOfTurnActions: Side;
  vaultAccessCount: RaidId;
  sanctumAccessCount: RaidId;
}

export interface QueryResult {
  manaCost: number | undefined;
  abilityManaCost: number | undefined;
  actionCost: number;
  attackValue: number;
  healthValue: number;
  shieldValue: number;
  breachValue: number;
  attackBoost: AttackBoost;
  boostCount: number;
  startOfTurnActions: number;
  vaultAccessCount: number;
  sanctumAccessCount: number;
}

export type QueryKind = keyof QueryInput & keyof QueryResult;

// Method signatures keep a single-kind delegate assignable to the
// all-kinds form used while building the cache.
export interface EventDelegateOf<K extends EventKind> {
  readonly family: "event";
  readonly kind: K;
  requirement(game: Game, scope: Scope, data: EventData[K]): boolean;
  mutation(game: Game, scope: Scope, data: EventData[K]): void;
}

export interface QueryDelegateOf<K extends QueryKind> {
  readonly family: "query";
  readonly kind: K;
  requirement(game: Game, scope: Scope, data: QueryInput[K]): boolean;
  transformation(game: Game, scope: Scope, data: QueryInput[K], current: QueryResult[K]): QueryResult[K];
}

export type EventDelegate = { [K in EventKind]: EventDelegateOf<K> }[EventKind];
export type QueryDelegate = { [K in QueryKind]: QueryDelegateOf<K> }[QueryKind];
export type Delegate = EventDelegate | QueryDelegate;
export type DelegateKind = Delegate["kind"];

export interface EventEntry<K extends EventKind> {
  readonly scope: Scope;
  readonly delegate: EventDelegateOf<K>;
}

export interface QueryEntry<K extends QueryKind> {
  readonly scope: Scope;
  readonly delegate: QueryDelegateOf<K>;
}

export type EventLookup = { readonly [K in EventKind]: ReadonlyArray<EventEntry<K>> };
export type QueryLookup = { readonly [K in QueryKind]: ReadonlyArray<QueryEntry<K>> };

/** Per-game index from delegate kind to the scoped delegates registered for it, in ability order. */
export interface DelegateCache {
  readonly events: EventLookup;
  readonly queries: QueryLookup;
}
