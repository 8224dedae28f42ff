import { abilities, cost, mutations, type CardDefinition } from "@ravenhold/engine";

export function hollowSentry(): CardDefinition {
  return {
    name: "Hollow Sentry",
    cost: cost(2),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [abilities.endRaid()],
    stats: { health: 2 },
  };
}

export function ashenWarder(): CardDefinition {
  return {
    name: "Ashen Warder",
    cost: cost(4),
    cardType: "minion",
    side: "overlord",
    rarity: "uncommon",
    abilities: [abilities.endRaid()],
    stats: { health: 4, shield: 1 },
  };
}

export function gravelOgre(): CardDefinition {
  return {
    name: "Gravel Ogre",
    cost: cost(3),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [abilities.strike(2)],
    stats: { health: 5 },
  };
}

export function thornwall(): CardDefinition {
  return {
    name: "Thornwall",
    cost: cost(1),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [
      abilities.combat("Gain 1 mana.", (game, scope) => {
        mutations.gainMana(game, scope.side, 1);
      }),
    ],
    stats: { health: 1, shield: 2 },
  };
}
