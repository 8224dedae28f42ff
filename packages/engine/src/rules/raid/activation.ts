import { invokeEvent } from "../../dispatch.js";
import { activeRaid } from "../../lookup.js";
import { setRaidActive, setRevealed, spendMana } from "../../mutations.js";
import { isFaceDown } from "../../positions.js";
import { manaCost } from "../../queries.js";
import { IllegalActionError } from "../../internal/invariant.js";
import { moduleLogger } from "../../logger.js";
import { continueRaid, raidDefenders } from "./defenders.js";
import { AWAIT_INPUT, RESOLVED, type RaidPhaseHandler } from "./types.js";

const log = moduleLogger("raid.activation");

/**
 * The Overlord decides whether to activate the raided room. Activating
 * reveals every face-down defender the Overlord can pay for, outermost first.
 */
export const activationPhase: RaidPhaseHandler = {
  phase: "activation",
  activeSide: "overlord",
  promptKind: "activate_room",

  enter(game) {
    const { raidId, target } = activeRaid(game.state);
    invokeEvent(game, "onRaidActivation", { raidId, target });
    if (game.state.raid === null) return RESOLVED;
    return AWAIT_INPUT;
  },

  actions() {
    return [{ type: "activate_room" }, { type: "pass_activation" }];
  },

  handleAction(game, action) {
    switch (action.type) {
      case "activate_room": {
        setRaidActive(game);
        for (const defender of raidDefenders(game).filter(isFaceDown)) {
          const cost = manaCost(game, defender.id) ?? 0;
          if (game.state.players.overlord.mana < cost) continue;
          spendMana(game, "overlord", cost);
          setRevealed(game, defender.id, true);
        }
        log.debug("room activated", { raidId: activeRaid(game.state).raidId });
        return continueRaid(game);
      }
      case "pass_activation":
        return continueRaid(game);
      default:
        throw new IllegalActionError(`Action ${action.type} is not legal during activation`);
    }
  },

  displayState(game) {
    return { kind: "defenders", defenders: raidDefenders(game).map((card) => card.id) };
  },
};
