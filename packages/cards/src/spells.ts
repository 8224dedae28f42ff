import { cost, mutations, onPlayCard, thisCard, type CardDefinition } from "@ravenhold/engine";

function gainManaSpell(name: string, side: CardDefinition["side"], price: number, amount: number): CardDefinition {
  return {
    name,
    cost: cost(price),
    cardType: side === "champion" ? "champion_spell" : "overlord_spell",
    side,
    rarity: "common",
    abilities: [
      {
        text: `Gain ${amount} mana.`,
        abilityType: { type: "standard" },
        delegates: [
          onPlayCard(thisCard, (game, scope) => {
            mutations.gainMana(game, scope.side, amount);
          }),
        ],
      },
    ],
    stats: {},
  };
}

export function pilfer(): CardDefinition {
  return gainManaSpell("Pilfer", "champion", 0, 2);
}

export function darkTithe(): CardDefinition {
  return gainManaSpell("Dark Tithe", "overlord", 1, 4);
}
