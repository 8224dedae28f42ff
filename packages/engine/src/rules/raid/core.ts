/**
 * Raid driver. Enters phases until one needs input, prompts the side that
 * must answer, and routes submitted raid actions to the current phase.
 */

import type { RaidAction } from "../../types/actions.js";
import type { Game } from "../../types/game.js";
import type { RaidPhase } from "../../types/state.js";
import type { RoomId, Side } from "../../types/primitives.js";
import { activeRaid } from "../../lookup.js";
import { clearPrompts, initiateRaid, setPrompt, setRaidPhase } from "../../mutations.js";
import { EngineInvariantError, IllegalActionError, invariant } from "../../internal/invariant.js";
import { accessPhase } from "./access.js";
import { activationPhase } from "./activation.js";
import { beginPhase } from "./begin.js";
import { encounterPhase } from "./encounter.js";
import type { PhaseTransition, RaidDisplayState, RaidPhaseHandler } from "./types.js";

const HANDLERS: Readonly<Record<RaidPhase, RaidPhaseHandler>> = {
  begin: beginPhase,
  activation: activationPhase,
  encounter: encounterPhase,
  access: accessPhase,
};

export function phaseHandler(phase: RaidPhase): RaidPhaseHandler {
  return HANDLERS[phase];
}

function promptActiveSide(game: Game): void {
  const handler = phaseHandler(activeRaid(game.state).phase);
  const responses = handler.actions(game);
  invariant(
    handler.promptKind !== null && responses.length > 0,
    `raid phase ${handler.phase} awaited input without any actions`,
  );
  setPrompt(game, handler.activeSide, { kind: handler.promptKind, responses });
}

function runTransitions(game: Game, first: PhaseTransition): void {
  let transition = first;
  for (;;) {
    if (transition.kind === "resolved" || game.state.raid === null) return;
    if (transition.kind === "await_input") {
      promptActiveSide(game);
      return;
    }
    setRaidPhase(game, transition.phase);
    transition = phaseHandler(transition.phase).enter(game);
  }
}

/**
 * Start a raid on `room` and run it until it needs a decision or resolves.
 * Callers pay any cost first.
 */
export function startRaid(game: Game, room: RoomId): void {
  initiateRaid(game, room);
  if (game.state.raid === null) return;
  runTransitions(game, beginPhase.enter(game));
}

export function sameRaidAction(left: RaidAction, right: RaidAction): boolean {
  switch (left.type) {
    case "use_weapon":
      return right.type === "use_weapon" && right.weaponId === left.weaponId;
    case "score_card":
      return right.type === "score_card" && right.cardId === left.cardId;
    default:
      return left.type === right.type;
  }
}

/** Legal raid actions for `side`; empty unless `side` is the one being prompted. */
export function raidActions(game: Game, side: Side): RaidAction[] {
  const raid = game.state.raid;
  if (raid === null) return [];
  const handler = phaseHandler(raid.phase);
  if (handler.activeSide !== side) return [];
  return handler.actions(game);
}

/**
 * Apply one raid action. Acting without a raid, out of turn, or with an
 * action the phase does not offer is a usage error.
 */
export function handleRaidAction(game: Game, side: Side, action: RaidAction): void {
  const raid = game.state.raid;
  if (raid === null) {
    throw new IllegalActionError("No raid is active");
  }
  const handler = phaseHandler(raid.phase);
  if (handler.activeSide !== side) {
    throw new IllegalActionError(`The ${side} cannot act during the ${raid.phase} phase`);
  }
  if (!handler.actions(game).some((legal) => sameRaidAction(legal, action))) {
    throw new IllegalActionError(`Action ${action.type} is not legal during the ${raid.phase} phase`);
  }

  if (game.state.players.overlord.prompt !== null || game.state.players.champion.prompt !== null) {
    clearPrompts(game);
  }
  runTransitions(game, handler.handleAction(game, action));
}

export function raidDisplayState(game: Game): RaidDisplayState {
  const raid = game.state.raid;
  if (raid === null) {
    throw new EngineInvariantError("raidDisplayState expected an active raid");
  }
  return phaseHandler(raid.phase).displayState(game);
}
