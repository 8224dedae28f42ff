import { abilities, cost, type CardDefinition } from "@ravenhold/engine";

export function maraudersEdge(): CardDefinition {
  return {
    name: "Marauder's Edge",
    cost: cost(3),
    cardType: "weapon",
    side: "champion",
    rarity: "common",
    abilities: [abilities.encounterBoost()],
    stats: { attack: 2, attackBoost: { cost: 1, bonus: 1 } },
  };
}

/** Cheap to boost past shields, weak on its own */
export function splitbarkBow(): CardDefinition {
  return {
    name: "Splitbark Bow",
    cost: cost(4),
    cardType: "weapon",
    side: "champion",
    rarity: "uncommon",
    abilities: [abilities.encounterBoost()],
    stats: { attack: 1, breach: 2, attackBoost: { cost: 2, bonus: 3 } },
  };
}

export function ironrootMaul(): CardDefinition {
  return {
    name: "Ironroot Maul",
    cost: cost(6),
    cardType: "weapon",
    side: "champion",
    rarity: "rare",
    abilities: [abilities.encounterBoost()],
    stats: { attack: 5, attackBoost: { cost: 1, bonus: 1 } },
  };
}
