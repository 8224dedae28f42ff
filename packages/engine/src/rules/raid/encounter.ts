import type { Game } from "../../types/game.js";
import type { RaidAction } from "../../types/actions.js";
import type { CardId } from "../../types/primitives.js";
import { invokeEvent } from "../../dispatch.js";
import { activeRaid, weapons } from "../../lookup.js";
import { endRaid, spendMana } from "../../mutations.js";
import { boostsToDefeatTarget, costToDefeatTarget } from "../../queries.js";
import { expectDefined, IllegalActionError } from "../../internal/invariant.js";
import { moduleLogger } from "../../logger.js";
import { continueRaid, currentDefender } from "./defenders.js";
import { AWAIT_INPUT, RESOLVED, type PhaseTransition, type RaidPhaseHandler } from "./types.js";

const log = moduleLogger("raid.encounter");

/** Weapons whose cost to defeat the current defender is defined and affordable */
function usableWeapons(game: Game): CardId[] {
  const defender = currentDefender(game);
  const mana = game.state.players.champion.mana;
  return weapons(game.state)
    .filter((weapon) => {
      const cost = costToDefeatTarget(game, weapon.id, defender.id);
      return cost !== undefined && cost <= mana;
    })
    .map((weapon) => weapon.id);
}

function endEncounter(game: Game): PhaseTransition {
  invokeEvent(game, "onEncounterEnd", activeRaid(game.state).raidId);
  if (game.state.raid === null) return RESOLVED;
  return continueRaid(game);
}

function useWeapon(game: Game, weaponId: CardId): PhaseTransition {
  const { raidId } = activeRaid(game.state);
  const defenderId = currentDefender(game).id;
  const cost = expectDefined(
    costToDefeatTarget(game, weaponId, defenderId),
    `raid.useWeapon ${weaponId} cannot defeat ${defenderId}`,
  );
  const boosts = expectDefined(boostsToDefeatTarget(game, weaponId, defenderId), "raid.useWeapon boost count");

  spendMana(game, "champion", cost);
  if (boosts > 0) {
    invokeEvent(game, "onActivateBoost", { cardId: weaponId, count: boosts });
  }
  log.debug("minion defeated", { raidId, defenderId, weaponId, cost });
  invokeEvent(game, "onMinionDefeated", { raidId, defenderId });
  if (game.state.raid === null) return RESOLVED;
  return endEncounter(game);
}

/**
 * The Champion faces one revealed defender: defeat it with a weapon, let its
 * combat ability fire, or retreat and end the raid.
 */
export const encounterPhase: RaidPhaseHandler = {
  phase: "encounter",
  activeSide: "champion",
  promptKind: "encounter",

  enter(game) {
    const { raidId } = activeRaid(game.state);
    invokeEvent(game, "onEncounterBegin", { raidId, defenderId: currentDefender(game).id });
    if (game.state.raid === null) return RESOLVED;
    return AWAIT_INPUT;
  },

  actions(game) {
    const actions: RaidAction[] = usableWeapons(game).map((weaponId): RaidAction => ({ type: "use_weapon", weaponId }));
    actions.push({ type: "no_weapon" }, { type: "retreat" });
    return actions;
  },

  handleAction(game, action) {
    switch (action.type) {
      case "use_weapon":
        return useWeapon(game, action.weaponId);
      case "no_weapon": {
        const { raidId } = activeRaid(game.state);
        invokeEvent(game, "onMinionCombatAbility", { raidId, defenderId: currentDefender(game).id });
        if (game.state.raid === null) return RESOLVED;
        return endEncounter(game);
      }
      case "retreat":
        endRaid(game, "failure");
        return RESOLVED;
      default:
        throw new IllegalActionError(`Action ${action.type} is not legal during an encounter`);
    }
  },

  displayState(game) {
    return { kind: "encounter", defenderId: currentDefender(game).id, weapons: usableWeapons(game) };
  },
};
