import type { Game } from "../../types/game.js";
import type { RaidAction } from "../../types/actions.js";
import type { CardId } from "../../types/primitives.js";
import { invokeEvent } from "../../dispatch.js";
import { activeRaid, deck, definitionOf, discardPile, findCard, hand, occupants } from "../../lookup.js";
import { endRaid, recordAccess, scoreCard, setRevealed } from "../../mutations.js";
import { inScorePile } from "../../positions.js";
import { sanctumAccessCount, vaultAccessCount } from "../../queries.js";
import { IllegalActionError } from "../../internal/invariant.js";
import { AWAIT_INPUT, RESOLVED, type RaidPhaseHandler } from "./types.js";

function selectAccessed(game: Game): CardId[] {
  const target = activeRaid(game.state).target;
  switch (target) {
    case "vault":
      return deck(game.state, "overlord")
        .slice(0, vaultAccessCount(game))
        .map((card) => card.id);
    case "sanctum":
      return hand(game.state, "overlord")
        .slice(0, sanctumAccessCount(game))
        .map((card) => card.id);
    case "crypts":
      return discardPile(game.state, "overlord").map((card) => card.id);
    default:
      return occupants(game.state, target).map((card) => card.id);
  }
}

function scoreable(game: Game, cardId: CardId): boolean {
  return definitionOf(game, cardId).cardType === "scheme" && !inScorePile(findCard(game.state, cardId).position);
}

/** The Champion accesses the room's cards and may score the schemes among them. */
export const accessPhase: RaidPhaseHandler = {
  phase: "access",
  activeSide: "champion",
  promptKind: "access",

  enter(game) {
    const { raidId } = activeRaid(game.state);
    invokeEvent(game, "onRaidAccessStart", raidId);
    if (game.state.raid === null) return RESOLVED;

    const accessed = selectAccessed(game);
    recordAccess(game, accessed);
    for (const cardId of accessed) {
      setRevealed(game, cardId, true);
    }

    invokeEvent(game, "onRaidSuccess", raidId);
    if (game.state.raid === null) return RESOLVED;
    return AWAIT_INPUT;
  },

  actions(game) {
    const actions: RaidAction[] = activeRaid(game.state)
      .accessed.filter((cardId) => scoreable(game, cardId))
      .map((cardId): RaidAction => ({ type: "score_card", cardId }));
    actions.push({ type: "end_raid" });
    return actions;
  },

  handleAction(game, action) {
    switch (action.type) {
      case "score_card":
        scoreCard(game, action.cardId, "champion");
        if (game.state.phase === "game_over") {
          endRaid(game, "success");
          return RESOLVED;
        }
        return AWAIT_INPUT;
      case "end_raid":
        endRaid(game, "success");
        return RESOLVED;
      default:
        throw new IllegalActionError(`Action ${action.type} is not legal during access`);
    }
  },

  displayState(game) {
    return { kind: "access", accessed: [...activeRaid(game.state).accessed] };
  },
};
