import { actions, type CardDefinition } from "@ravenhold/engine";

export function regentOfAshes(): CardDefinition {
  return {
    name: "Regent of Ashes",
    cost: actions(0),
    cardType: "identity",
    side: "overlord",
    rarity: "exalted",
    abilities: [],
    stats: {},
  };
}

export function wayfarerIlsen(): CardDefinition {
  return {
    name: "Wayfarer Ilsen",
    cost: actions(0),
    cardType: "identity",
    side: "champion",
    rarity: "exalted",
    abilities: [],
    stats: {},
  };
}
