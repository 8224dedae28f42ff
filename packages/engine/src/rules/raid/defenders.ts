import type { Game } from "../../types/game.js";
import type { CardState } from "../../types/state.js";
import type { CardId } from "../../types/primitives.js";
import { activeRaid, defenders, findCard } from "../../lookup.js";
import { setEncounter } from "../../mutations.js";
import { expectDefined } from "../../internal/invariant.js";
import { advance, type PhaseTransition } from "./types.js";

/** Defenders of the raided room, outermost first. */
export function raidDefenders(game: Game): CardState[] {
  return defenders(game.state, activeRaid(game.state).target);
}

/**
 * The next revealed defender inward of `current`, or the outermost one when
 * `current` is null. Face-down defenders are passed by. When `current` has
 * left the room the search starts again from the outermost defender.
 */
export function nextEncounter(game: Game, current: CardId | null): CardId | undefined {
  const ordered = raidDefenders(game);
  const start = current === null ? 0 : ordered.findIndex((card) => card.id === current) + 1;
  return ordered.slice(start).find((card) => card.data.revealed && card.id !== current)?.id;
}

export function currentDefender(game: Game): CardState {
  const defenderId = expectDefined(
    activeRaid(game.state).encounter ?? undefined,
    "raid.currentDefender no encounter in progress",
  );
  return findCard(game.state, defenderId);
}

/** Move on to the next revealed defender, or to the access phase when none remain. */
export function continueRaid(game: Game): PhaseTransition {
  const raid = activeRaid(game.state);
  const next = nextEncounter(game, raid.encounter);
  if (next !== undefined) {
    setEncounter(game, next);
    return advance("encounter");
  }
  if (raid.encounter !== null) {
    setEncounter(game, null);
  }
  return advance("access");
}
