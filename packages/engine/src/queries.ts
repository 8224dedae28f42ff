/**
 * queries.ts
 *
 * Derived values. Each looks up a base value from the card definition and
 * folds the matching query delegates over it.
 */

import type { AttackBoost, CardStats } from "./types/cards.js";
import type { Game } from "./types/game.js";
import type { AbilityId, CardId, Side } from "./types/primitives.js";
import { performQuery } from "./dispatch.js";
import { activeRaid, definitionOf, findCard } from "./lookup.js";
import { expectDefined } from "./internal/invariant.js";

export function stats(game: Game, cardId: CardId): CardStats {
  return definitionOf(game, cardId).stats;
}

/**
 * Mana cost to play a card: the summon cost of a minion, the unveil cost of a
 * project, the casting cost of anything else. Schemes have none.
 */
export function manaCost(game: Game, cardId: CardId): number | undefined {
  return performQuery(game, "manaCost", cardId, definitionOf(game, cardId).cost.mana);
}

export function abilityManaCost(game: Game, abilityId: AbilityId): number | undefined {
  const ability = expectDefined(
    definitionOf(game, abilityId.cardId).abilities[abilityId.index],
    `queries.abilityManaCost unknown ability ${abilityId.cardId}#${abilityId.index}`,
  );
  const base = ability.abilityType.type === "activated" ? ability.abilityType.cost.mana : undefined;
  return performQuery(game, "abilityManaCost", abilityId, base);
}

export function actionCost(game: Game, cardId: CardId): number {
  return performQuery(game, "actionCost", cardId, definitionOf(game, cardId).cost.actions);
}

export function attack(game: Game, cardId: CardId): number {
  return performQuery(game, "attackValue", cardId, stats(game, cardId).attack ?? 0);
}

export function health(game: Game, cardId: CardId): number {
  return performQuery(game, "healthValue", cardId, stats(game, cardId).health ?? 0);
}

export function shield(game: Game, cardId: CardId): number {
  return performQuery(game, "shieldValue", cardId, stats(game, cardId).shield ?? 0);
}

export function breach(game: Game, cardId: CardId): number {
  return performQuery(game, "breachValue", cardId, stats(game, cardId).breach ?? 0);
}

/** Undefined for cards without a boost */
export function attackBoost(game: Game, cardId: CardId): AttackBoost | undefined {
  const base = stats(game, cardId).attackBoost;
  if (base === undefined) return undefined;
  return performQuery(game, "attackBoost", cardId, { ...base });
}

export function boostCount(game: Game, cardId: CardId): number {
  return performQuery(game, "boostCount", cardId, findCard(game.state, cardId).data.boostCount);
}

function shieldCost(game: Game, attackerId: CardId, targetId: CardId): number {
  return Math.max(0, shield(game, targetId) - breach(game, attackerId));
}

/**
 * Number of boost activations `attackerId` needs to reach the health of
 * `targetId`: 0 when its attack already suffices, undefined when it cannot.
 */
export function boostsToDefeatTarget(game: Game, attackerId: CardId, targetId: CardId): number | undefined {
  const target = health(game, targetId);
  const current = attack(game, attackerId);
  if (current >= target) return 0;

  const boost = attackBoost(game, attackerId);
  if (boost === undefined || boost.bonus === 0) return undefined;
  return Math.ceil((target - current) / boost.bonus);
}

/**
 * Mana the owner of `attackerId` must spend on boosts to defeat `targetId`,
 * plus the target's shield net of the attacker's breach. Undefined when the
 * defeat is impossible.
 */
export function costToDefeatTarget(game: Game, attackerId: CardId, targetId: CardId): number | undefined {
  const boosts = boostsToDefeatTarget(game, attackerId, targetId);
  if (boosts === undefined) return undefined;

  const boostCost = boosts === 0 ? 0 : boosts * expectDefined(attackBoost(game, attackerId), "boost").cost;
  return boostCost + shieldCost(game, attackerId, targetId);
}

export function startOfTurnActionCount(game: Game, side: Side): number {
  return performQuery(game, "startOfTurnActions", side, game.state.config.actionsPerTurn);
}

/** Cards the Champion accesses from the vault during the active raid */
export function vaultAccessCount(game: Game): number {
  const raid = activeRaid(game.state);
  return performQuery(game, "vaultAccessCount", raid.raidId, 1);
}

/** Cards the Champion accesses from the sanctum during the active raid */
export function sanctumAccessCount(game: Game): number {
  const raid = activeRaid(game.state);
  return performQuery(game, "sanctumAccessCount", raid.raidId, 1);
}

/** True if `side` is the side currently empowered to act */
export function canTakeAction(game: Game, side: Side): boolean {
  if (game.state.phase === "game_over") return false;
  const raid = game.state.raid;
  if (raid !== null) {
    return raid.phase === "activation" ? side === "overlord" : side === "champion";
  }
  return side === game.state.turn.side;
}

/**
 * True if `side` holds the turn with action points left and nothing pending,
 * and so can take a primary game action.
 */
export function inMainPhase(game: Game, side: Side): boolean {
  return (
    game.state.players[side].actions > 0 &&
    game.state.phase === "play" &&
    game.state.turn.side === side &&
    game.state.raid === null &&
    game.state.players.overlord.prompt === null &&
    game.state.players.champion.prompt === null
  );
}
