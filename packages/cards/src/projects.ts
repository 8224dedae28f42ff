import { abilities, cost, type CardDefinition } from "@ravenhold/engine";

export function gildedMine(): CardDefinition {
  return {
    name: "Gilded Mine",
    cost: cost(4),
    cardType: "project",
    side: "overlord",
    rarity: "common",
    abilities: [abilities.unveilAtDuskThenStore(12), abilities.takeManaAtDusk(3)],
    stats: {},
  };
}

export function titheCollector(): CardDefinition {
  return {
    name: "Tithe Collector",
    cost: cost(2),
    cardType: "project",
    side: "overlord",
    rarity: "common",
    abilities: [abilities.unveilAtDuskThenStore(6), abilities.takeManaAtDusk(2)],
    stats: {},
  };
}
