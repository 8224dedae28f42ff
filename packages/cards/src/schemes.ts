import { abilities, actions, type CardDefinition } from "@ravenhold/engine";

export function crownOfThorns(): CardDefinition {
  return {
    name: "Crown of Thorns",
    cost: actions(1),
    cardType: "scheme",
    side: "overlord",
    rarity: "uncommon",
    abilities: [],
    stats: { schemePoints: { levelRequirement: 4, points: 3 } },
  };
}

export function blackLedger(): CardDefinition {
  return {
    name: "Black Ledger",
    cost: actions(1),
    cardType: "scheme",
    side: "overlord",
    rarity: "common",
    abilities: [abilities.onScoreGainMana(7)],
    stats: { schemePoints: { levelRequirement: 3, points: 2 } },
  };
}

export function emberSigil(): CardDefinition {
  return {
    name: "Ember Sigil",
    cost: actions(1),
    cardType: "scheme",
    side: "overlord",
    rarity: "common",
    abilities: [],
    stats: { schemePoints: { levelRequirement: 2, points: 1 } },
  };
}
