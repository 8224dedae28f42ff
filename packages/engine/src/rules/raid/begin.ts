import { invokeEvent } from "../../dispatch.js";
import { activeRaid } from "../../lookup.js";
import { isFaceDown } from "../../positions.js";
import { IllegalActionError } from "../../internal/invariant.js";
import { continueRaid, raidDefenders } from "./defenders.js";
import { advance, RESOLVED, type RaidPhaseHandler } from "./types.js";

export const beginPhase: RaidPhaseHandler = {
  phase: "begin",
  activeSide: "champion",
  promptKind: null,

  enter(game) {
    const { raidId, target } = activeRaid(game.state);
    invokeEvent(game, "onRaidStart", { raidId, target });

    // A raid-start effect may have ended the raid
    if (game.state.raid === null) return RESOLVED;

    if (raidDefenders(game).some(isFaceDown)) {
      return advance("activation");
    }
    return continueRaid(game);
  },

  actions() {
    return [];
  },

  handleAction() {
    throw new IllegalActionError("No actions for the begin phase");
  },

  displayState() {
    return { kind: "none" };
  },
};
