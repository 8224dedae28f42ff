/**
 * dispatch.ts
 *
 * Core of the delegate system:
 * - Build the per-game delegate cache from the cards whose abilities are live
 * - Invoke event delegates when a game event occurs
 * - Fold query delegates over a base value when a derived value is needed
 *
 * Each dispatch call iterates the list it read at call start. Rebuilding the
 * cache swaps in new frozen lists and never touches published ones, so an
 * effect that moves cards in or out of play cannot disturb the iteration
 * that triggered it.
 */

import type {
  Delegate,
  DelegateCache,
  EventData,
  EventDelegateOf,
  EventEntry,
  EventKind,
  QueryDelegateOf,
  QueryEntry,
  QueryInput,
  QueryKind,
  QueryResult,
  Scope,
} from "./types/delegates.js";
import type { Game } from "./types/game.js";
import type { GameState } from "./types/state.js";
import type { CardCatalog } from "./types/game.js";
import type { AbilityId, Side } from "./types/primitives.js";
import { hasLiveAbilities } from "./positions.js";

type MutableEventLookup = { [K in EventKind]: EventEntry<K>[] };
type MutableQueryLookup = { [K in QueryKind]: QueryEntry<K>[] };

function emptyEventLookup(): MutableEventLookup {
  return {
    onDawn: [],
    onDusk: [],
    onMoveCard: [],
    onDrawCard: [],
    onPlayCard: [],
    onRevealCard: [],
    onStoredManaTaken: [],
    onActivateAbility: [],
    onLevelUp: [],
    onScoreCard: [],
    onRaidBegin: [],
    onRaidStart: [],
    onRaidActivation: [],
    onEncounterBegin: [],
    onActivateBoost: [],
    onMinionDefeated: [],
    onMinionCombatAbility: [],
    onEncounterEnd: [],
    onRaidAccessStart: [],
    onRaidSuccess: [],
    onRaidFailure: [],
    onRaidEnd: [],
  };
}

function emptyQueryLookup(): MutableQueryLookup {
  return {
    manaCost: [],
    abilityManaCost: [],
    actionCost: [],
    attackValue: [],
    healthValue: [],
    shieldValue: [],
    breachValue: [],
    attackBoost: [],
    boostCount: [],
    startOfTurnActions: [],
    vaultAccessCount: [],
    sanctumAccessCount: [],
  };
}

const EVENT_KINDS: ReadonlySet<string> = new Set(Object.keys(emptyEventLookup()));
const QUERY_KINDS: ReadonlySet<string> = new Set(Object.keys(emptyQueryLookup()));

export function isEventKind(kind: string): kind is EventKind {
  return EVENT_KINDS.has(kind);
}

export function isQueryKind(kind: string): kind is QueryKind {
  return QUERY_KINDS.has(kind);
}

export function createScope(abilityId: AbilityId, side: Side): Scope {
  return Object.freeze({
    abilityId: Object.freeze({ ...abilityId }),
    cardId: abilityId.cardId,
    side,
  });
}

function addEvent<K extends EventKind>(lookup: MutableEventLookup, scope: Scope, delegate: EventDelegateOf<K>): void {
  lookup[delegate.kind].push({ scope, delegate });
}

function addQuery<K extends QueryKind>(lookup: MutableQueryLookup, scope: Scope, delegate: QueryDelegateOf<K>): void {
  lookup[delegate.kind].push({ scope, delegate });
}

function register(events: MutableEventLookup, queries: MutableQueryLookup, scope: Scope, delegate: Delegate): void {
  if (delegate.family === "event") {
    addEvent(events, scope, delegate);
  } else {
    addQuery(queries, scope, delegate);
  }
}

function freezeLists<T extends Record<string, readonly unknown[]>>(lookup: T): T {
  for (const list of Object.values(lookup)) {
    Object.freeze(list);
  }
  return Object.freeze(lookup);
}

/**
 * Index every delegate of every live card. Cards are visited in collection
 * order and abilities in declaration order, so the result depends only on
 * the card collection.
 */
export function buildDelegateCache(state: GameState, catalog: CardCatalog): DelegateCache {
  const events = emptyEventLookup();
  const queries = emptyQueryLookup();

  for (const card of state.cards) {
    if (!hasLiveAbilities(card.position)) continue;
    const definition = catalog.get(card.name);
    definition.abilities.forEach((ability, index) => {
      const scope = createScope({ cardId: card.id, index }, card.side);
      for (const delegate of ability.delegates) {
        register(events, queries, scope, delegate);
      }
    });
  }

  return Object.freeze({ events: freezeLists(events), queries: freezeLists(queries) });
}

export function populateDelegateCache(game: Game): void {
  game.delegateCache = buildDelegateCache(game.state, game.catalog);
}

export function delegateCount(game: Game, kind: EventKind | QueryKind): number {
  if (isEventKind(kind)) return game.delegateCache.events[kind].length;
  return game.delegateCache.queries[kind].length;
}

/**
 * Run each delegate registered for `kind` whose requirement holds. A
 * mutation that throws stops the remaining delegates and propagates.
 */
export function invokeEvent<K extends EventKind>(game: Game, kind: K, data: EventData[K]): void {
  const entries = game.delegateCache.events[kind];
  for (const { scope, delegate } of entries) {
    if (delegate.requirement(game, scope, data)) {
      delegate.mutation(game, scope, data);
    }
  }
}

/** Fold every matching transformation over `initialValue`. */
export function performQuery<K extends QueryKind>(
  game: Game,
  kind: K,
  data: QueryInput[K],
  initialValue: QueryResult[K],
): QueryResult[K] {
  const entries = game.delegateCache.queries[kind];
  let result = initialValue;
  for (const { scope, delegate } of entries) {
    if (delegate.requirement(game, scope, data)) {
      result = delegate.transformation(game, scope, data, result);
    }
  }
  return result;
}
