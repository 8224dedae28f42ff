/**
 * abilities.ts
 *
 * Reusable abilities shared by many cards.
 */

import type { Ability, CardCost } from "./types/cards.js";
import type { EncounterEvent, Scope } from "./types/delegates.js";
import type { Game } from "./types/game.js";
import {
  always,
  atDusk,
  eventDelegate,
  faceDownInPlay,
  onActivated,
  onMinionCombatAbility,
  onPlayCard,
  onScoreCard,
  queryDelegate,
  thisBoost,
  thisCard,
} from "./helpers.js";
import { findCard, hand } from "./lookup.js";
import {
  clearBoost,
  endRaid as endActiveRaid,
  gainMana,
  moveCard,
  setRevealed,
  setStoredMana,
  spendMana,
  takeStoredMana,
  writeBoost,
} from "./mutations.js";
import { boostCount, manaCost, stats } from "./queries.js";
import { expectDefined } from "./internal/invariant.js";

function discardWhenEmpty(game: Game, scope: Scope): void {
  const card = findCard(game.state, scope.cardId);
  if (card.data.storedMana === 0 && card.position.kind !== "discard_pile") {
    moveCard(game, scope.cardId, { kind: "discard_pile", side: scope.side });
  }
}

/**
 * Store `amount` mana on this card when it is played. The card is discarded
 * once its stored mana runs out.
 */
export function storeManaOnPlay(amount: number): Ability {
  return {
    text: `Play: Store ${amount} mana.`,
    abilityType: { type: "standard" },
    delegates: [
      onPlayCard(thisCard, (game, scope) => {
        setStoredMana(game, scope.cardId, amount);
      }),
      eventDelegate("onStoredManaTaken", thisCard, discardWhenEmpty),
    ],
  };
}

/** Activated: take up to `amount` of this card's stored mana. */
export function activatedTakeMana(amount: number, activationCost: CardCost): Ability {
  return {
    text: `Take ${amount} mana.`,
    abilityType: { type: "activated", cost: activationCost },
    delegates: [
      onActivated((game, scope) => {
        takeStoredMana(game, scope.cardId, amount);
      }),
    ],
  };
}

/**
 * The standard weapon ability: pay the boost cost any number of times during
 * an encounter to add the boost bonus to this card's attack.
 */
export function encounterBoost(): Ability {
  return {
    text: "Boost: pay to add attack for this encounter.",
    abilityType: { type: "encounter" },
    delegates: [
      eventDelegate("onActivateBoost", thisBoost, (game, _scope, data) => {
        writeBoost(game, data);
      }),
      queryDelegate("attackValue", thisCard, (game, _scope, cardId, current) => {
        const bonus = expectDefined(stats(game, cardId).attackBoost, `abilities.encounterBoost ${cardId} has no boost`).bonus;
        return current + boostCount(game, cardId) * bonus;
      }),
      eventDelegate("onEncounterEnd", always, (game, scope) => {
        clearBoost(game, scope.cardId);
      }),
    ],
  };
}

/** A minion ability that fires when the Champion does not defeat it. */
export function combat(text: string, mutation: (game: Game, scope: Scope, data: EncounterEvent) => void): Ability {
  return {
    text: `Combat: ${text}`,
    abilityType: { type: "standard" },
    delegates: [onMinionCombatAbility(mutation)],
  };
}

export function endRaid(): Ability {
  return combat("End the raid.", (game) => {
    endActiveRaid(game, "failure");
  });
}

/** Discard the Champion's `count` longest-held hand cards. */
export function strike(count: number): Ability {
  return combat(`Strike ${count}.`, (game) => {
    for (const card of hand(game.state, "champion").slice(0, count)) {
      moveCard(game, card.id, { kind: "discard_pile", side: "champion" });
    }
  });
}

/** Gain `amount` mana when the Overlord scores this scheme. */
export function onScoreGainMana(amount: number): Ability {
  return {
    text: `Score: Gain ${amount} mana.`,
    abilityType: { type: "standard" },
    delegates: [
      onScoreCard((game, scope) => {
        const position = findCard(game.state, scope.cardId).position;
        if (position.kind === "scored" && position.side === scope.side) {
          gainMana(game, scope.side, amount);
        }
      }),
    ],
  };
}

/**
 * Dusk: if this card is face down in a room and its owner can pay its mana
 * cost, reveal it and store `amount` mana on it.
 */
export function unveilAtDuskThenStore(amount: number): Ability {
  return {
    text: `Dusk: Unveil this project, then store ${amount} mana.`,
    abilityType: { type: "standard" },
    delegates: [
      eventDelegate("onDusk", faceDownInPlay, (game, scope) => {
        const unveilCost = manaCost(game, scope.cardId) ?? 0;
        if (game.state.players[scope.side].mana < unveilCost) return;
        spendMana(game, scope.side, unveilCost);
        setRevealed(game, scope.cardId, true);
        setStoredMana(game, scope.cardId, amount);
      }),
    ],
  };
}

/** Dusk: take up to `amount` stored mana; discard this card once it is empty. */
export function takeManaAtDusk(amount: number): Ability {
  return {
    text: `Dusk: Take ${amount} mana.`,
    abilityType: { type: "standard" },
    delegates: [
      atDusk((game, scope) => {
        takeStoredMana(game, scope.cardId, amount);
        discardWhenEmpty(game, scope);
      }),
    ],
  };
}
