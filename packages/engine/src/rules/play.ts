/**
 * Main-phase actions: draw, gain mana, play a card, activate an ability,
 * level up a room and initiate a raid. Each `*Error` check returns a reason
 * the action is illegal, or null; the matching action throws that reason as
 * an IllegalActionError.
 */

import type { Ability, CardDefinition } from "../types/cards.js";
import type { Game } from "../types/game.js";
import type { AbilityId, CardId, RoomId, Side } from "../types/primitives.js";
import { ALL_ROOMS, OUTER_ROOMS, isInnerRoom } from "../types/primitives.js";
import { invokeEvent } from "../dispatch.js";
import { deck, defenders, definitionOf, findCard, occupants } from "../lookup.js";
import {
  addLevel,
  gainMana,
  moveCard,
  scoreCard,
  setRevealed,
  spendActionPoints,
  spendMana,
} from "../mutations.js";
import { inPlay } from "../positions.js";
import { abilityManaCost, actionCost, inMainPhase, manaCost } from "../queries.js";
import { IllegalActionError } from "../internal/invariant.js";
import { moduleLogger } from "../logger.js";
import { startRaid } from "./raid/core.js";

const log = moduleLogger("rules.play");

function assertLegal(reason: string | null): void {
  if (reason !== null) {
    throw new IllegalActionError(reason);
  }
}

function mainPhaseError(game: Game, side: Side): string | null {
  return inMainPhase(game, side) ? null : `The ${side} cannot take a main-phase action now`;
}

/** Draw up to `count` cards from the top of `side`'s deck. */
export function drawCards(game: Game, side: Side, count: number): CardId[] {
  const drawn = deck(game.state, side)
    .slice(0, count)
    .map((card) => card.id);
  for (const cardId of drawn) {
    moveCard(game, cardId, { kind: "hand", side });
  }
  return drawn;
}

// ── Draw / gain mana ─────────────────────────────────────────────

export function drawCardError(game: Game, side: Side): string | null {
  if (deck(game.state, side).length === 0) return "Deck is empty";
  return mainPhaseError(game, side);
}

export function drawCardAction(game: Game, side: Side): void {
  assertLegal(drawCardError(game, side));
  spendActionPoints(game, side, 1);
  drawCards(game, side, 1);
}

export function gainManaAction(game: Game, side: Side): void {
  assertLegal(mainPhaseError(game, side));
  spendActionPoints(game, side, 1);
  gainMana(game, side, 1);
}

// ── Play card ────────────────────────────────────────────────────

/** Rooms a card can be played into; empty for cards that take no room */
export function playableRooms(definition: CardDefinition): readonly RoomId[] {
  switch (definition.cardType) {
    case "minion":
      return ALL_ROOMS;
    case "project":
    case "scheme":
      return OUTER_ROOMS;
    default:
      return [];
  }
}

function isSpell(definition: CardDefinition): boolean {
  return definition.cardType === "champion_spell" || definition.cardType === "overlord_spell";
}

/** Overlord room cards are paid for with mana when they are revealed, not when played */
function paysManaOnPlay(definition: CardDefinition): boolean {
  return playableRooms(definition).length === 0;
}

export function playCardError(game: Game, side: Side, cardId: CardId, room?: RoomId): string | null {
  const mainPhase = mainPhaseError(game, side);
  if (mainPhase !== null) return mainPhase;

  const card = game.state.cards.find((candidate) => candidate.id === cardId);
  if (card === undefined || card.side !== side || card.position.kind !== "hand") {
    return `Card ${cardId} is not in the ${side}'s hand`;
  }

  const definition = definitionOf(game, cardId);
  if (definition.cardType === "identity") return "Identities cannot be played";

  const rooms = playableRooms(definition);
  if (rooms.length > 0 && (room === undefined || !rooms.includes(room))) {
    return `${definition.name} must be played into one of: ${rooms.join(", ")}`;
  }
  if (rooms.length === 0 && room !== undefined) {
    return `${definition.name} does not target a room`;
  }

  const player = game.state.players[side];
  if (actionCost(game, cardId) > player.actions) return "Not enough action points";
  if (paysManaOnPlay(definition) && (manaCost(game, cardId) ?? 0) > player.mana) return "Not enough mana";
  return null;
}

export function playCard(game: Game, side: Side, cardId: CardId, room?: RoomId): void {
  assertLegal(playCardError(game, side, cardId, room));
  const definition = definitionOf(game, cardId);
  log.debug("playCard", { side, cardId, name: definition.name, room });

  spendActionPoints(game, side, actionCost(game, cardId));
  if (paysManaOnPlay(definition)) {
    spendMana(game, side, manaCost(game, cardId) ?? 0);
  }

  if (isSpell(definition)) {
    setRevealed(game, cardId, true);
    invokeEvent(game, "onPlayCard", cardId);
    if (findCard(game.state, cardId).position.kind === "hand") {
      moveCard(game, cardId, { kind: "discard_pile", side });
    }
    return;
  }

  switch (definition.cardType) {
    case "weapon":
      setRevealed(game, cardId, true);
      moveCard(game, cardId, { kind: "arena_item", location: "weapons" });
      return;
    case "artifact":
      setRevealed(game, cardId, true);
      moveCard(game, cardId, { kind: "arena_item", location: "artifacts" });
      return;
    default: {
      if (room === undefined) {
        throw new IllegalActionError(`${definition.name} requires a room`);
      }
      const location = definition.cardType === "minion" ? "defender" : "occupant";
      // Room cards enter face down, even one the Champion saw while accessing
      setRevealed(game, cardId, false);
      moveCard(game, cardId, { kind: "room", room, location });
    }
  }
}

// ── Activated abilities ──────────────────────────────────────────

function activatedAbility(game: Game, abilityId: AbilityId): Ability | undefined {
  const card = game.state.cards.find((candidate) => candidate.id === abilityId.cardId);
  if (card === undefined) return undefined;
  const ability = definitionOf(game, card.id).abilities[abilityId.index];
  return ability?.abilityType.type === "activated" ? ability : undefined;
}

export function activateAbilityError(game: Game, side: Side, abilityId: AbilityId, room?: RoomId): string | null {
  const mainPhase = mainPhaseError(game, side);
  if (mainPhase !== null) return mainPhase;

  const ability = activatedAbility(game, abilityId);
  if (ability === undefined || ability.abilityType.type !== "activated") {
    return `No activated ability ${abilityId.cardId}#${abilityId.index}`;
  }
  const card = findCard(game.state, abilityId.cardId);
  const usable = card.position.kind === "identity" || (inPlay(card.position) && card.data.revealed);
  if (card.side !== side || !usable) return `The ${side} cannot activate ${abilityId.cardId}`;

  const target = ability.abilityType.target;
  if (target === undefined) {
    if (room !== undefined) return "This ability does not target a room";
  } else {
    if (room === undefined) return "This ability requires a room";
    if (!target(game, abilityId, room)) return `${room} is not a valid target`;
  }

  const player = game.state.players[side];
  if (ability.abilityType.cost.actions > player.actions) return "Not enough action points";
  if ((abilityManaCost(game, abilityId) ?? 0) > player.mana) return "Not enough mana";
  return null;
}

export function activateAbility(game: Game, side: Side, abilityId: AbilityId, room?: RoomId): void {
  assertLegal(activateAbilityError(game, side, abilityId, room));
  const ability = activatedAbility(game, abilityId);
  if (ability === undefined || ability.abilityType.type !== "activated") {
    throw new IllegalActionError(`No activated ability ${abilityId.cardId}#${abilityId.index}`);
  }
  log.debug("activateAbility", { side, abilityId, room });

  spendActionPoints(game, side, ability.abilityType.cost.actions);
  spendMana(game, side, abilityManaCost(game, abilityId) ?? 0);
  invokeEvent(game, "onActivateAbility", room === undefined ? { abilityId } : { abilityId, room });
}

// ── Level up ─────────────────────────────────────────────────────

export function levelUpRoomError(game: Game, side: Side, room: RoomId): string | null {
  if (side !== "overlord") return "Only the overlord levels up rooms";
  const mainPhase = mainPhaseError(game, side);
  if (mainPhase !== null) return mainPhase;
  if (occupants(game.state, room).length === 0) return `Room ${room} has no occupants`;
  if (game.state.players.overlord.mana < game.state.config.levelUpCost) return "Not enough mana";
  return null;
}

/** Add a level to each occupant of `room`; schemes reaching their requirement are scored. */
export function levelUpRoom(game: Game, side: Side, room: RoomId): void {
  assertLegal(levelUpRoomError(game, side, room));
  spendActionPoints(game, side, 1);
  spendMana(game, side, game.state.config.levelUpCost);

  for (const occupant of occupants(game.state, room)) {
    addLevel(game, occupant.id);
  }

  for (const occupant of occupants(game.state, room)) {
    const points = definitionOf(game, occupant.id).stats.schemePoints;
    if (points === undefined || occupant.data.cardLevel < points.levelRequirement) continue;
    if (game.state.phase !== "play") return;
    scoreCard(game, occupant.id, "overlord");
  }
}

// ── Raids ────────────────────────────────────────────────────────

export function initiateRaidError(game: Game, side: Side, room: RoomId): string | null {
  if (side !== "champion") return "Only the champion raids";
  const mainPhase = mainPhaseError(game, side);
  if (mainPhase !== null) return mainPhase;
  if (game.state.players.champion.actions < game.state.config.raidActionCost) return "Not enough action points";
  if (!isInnerRoom(room) && occupants(game.state, room).length === 0 && defenders(game.state, room).length === 0) {
    return `Room ${room} is empty`;
  }
  return null;
}

export function initiateRaidAction(game: Game, side: Side, room: RoomId): void {
  assertLegal(initiateRaidError(game, side, room));
  spendActionPoints(game, side, game.state.config.raidActionCost);
  startRaid(game, room);
}
