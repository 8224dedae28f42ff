import type { GameAction } from "../types/actions.js";
import type { Game } from "../types/game.js";
import type { Side } from "../types/primitives.js";
import { ALL_ROOMS } from "../types/primitives.js";
import { definitionOf, hand } from "../lookup.js";
import { inMainPhase } from "../queries.js";
import {
  activateAbilityError,
  drawCardError,
  initiateRaidError,
  levelUpRoomError,
  playCardError,
  playableRooms,
} from "./play.js";
import { endTurnError } from "./turns.js";
import { raidActions } from "./raid/core.js";

function activatableAbilities(game: Game, side: Side): GameAction[] {
  const actions: GameAction[] = [];
  for (const card of game.state.cards) {
    if (card.side !== side) continue;
    definitionOf(game, card.id).abilities.forEach((ability, index) => {
      if (ability.abilityType.type !== "activated") return;
      const abilityId = { cardId: card.id, index };
      const rooms = ability.abilityType.target === undefined ? [undefined] : ALL_ROOMS;
      for (const room of rooms) {
        if (activateAbilityError(game, side, abilityId, room) !== null) continue;
        actions.push(room === undefined ? { type: "ACTIVATE_ABILITY", abilityId } : { type: "ACTIVATE_ABILITY", abilityId, room });
      }
    });
  }
  return actions;
}

function playableCards(game: Game, side: Side): GameAction[] {
  const actions: GameAction[] = [];
  for (const card of hand(game.state, side)) {
    const rooms = playableRooms(definitionOf(game, card.id));
    if (rooms.length === 0) {
      if (playCardError(game, side, card.id) === null) {
        actions.push({ type: "PLAY_CARD", cardId: card.id });
      }
      continue;
    }
    for (const room of rooms) {
      if (playCardError(game, side, card.id, room) === null) {
        actions.push({ type: "PLAY_CARD", cardId: card.id, room });
      }
    }
  }
  return actions;
}

/**
 * Every action `side` may submit right now. During a raid only the prompted
 * side has actions.
 */
export function legalActions(game: Game, side: Side): GameAction[] {
  if (game.state.phase !== "play") return [];

  if (game.state.raid !== null) {
    return raidActions(game, side).map((action): GameAction => ({ type: "RAID_ACTION", action }));
  }

  const actions: GameAction[] = [];
  if (inMainPhase(game, side)) {
    if (drawCardError(game, side) === null) actions.push({ type: "DRAW_CARD" });
    actions.push({ type: "GAIN_MANA" });
    actions.push(...playableCards(game, side));
    actions.push(...activatableAbilities(game, side));
    for (const room of ALL_ROOMS) {
      if (levelUpRoomError(game, side, room) === null) actions.push({ type: "LEVEL_UP_ROOM", room });
      if (initiateRaidError(game, side, room) === null) actions.push({ type: "INITIATE_RAID", room });
    }
  }
  if (endTurnError(game, side) === null) actions.push({ type: "END_TURN" });
  return actions;
}
