import type { Deck } from "@ravenhold/engine";

export const STARTER_OVERLORD_DECK: Deck = {
  identity: "Regent of Ashes",
  cards: {
    "Hollow Sentry": 3,
    "Ashen Warder": 2,
    "Gravel Ogre": 2,
    Thornwall: 2,
    "Gilded Mine": 2,
    "Tithe Collector": 2,
    "Crown of Thorns": 3,
    "Black Ledger": 3,
    "Ember Sigil": 3,
    "Dark Tithe": 3,
  },
};

export const STARTER_CHAMPION_DECK: Deck = {
  identity: "Wayfarer Ilsen",
  cards: {
    "Lodestar Prism": 3,
    "Sanctum Key": 2,
    "Gathering Jar": 2,
    "Starlit Gate": 1,
    "Marauder's Edge": 3,
    "Splitbark Bow": 2,
    "Ironroot Maul": 2,
    Pilfer: 3,
  },
};
