// @ravenhold/cards
// Sample card set and starter decks for the Ravenhold engine
import { buildCatalog, type CardCatalog, type CardDefinition } from "@ravenhold/engine";
import { gatheringJar, lodestarPrism, sanctumKey, starlitGate } from "./artifacts.js";
import { regentOfAshes, wayfarerIlsen } from "./identities.js";
import { ashenWarder, gravelOgre, hollowSentry, thornwall } from "./minions.js";
import { gildedMine, titheCollector } from "./projects.js";
import { blackLedger, crownOfThorns, emberSigil } from "./schemes.js";
import { darkTithe, pilfer } from "./spells.js";
import { ironrootMaul, maraudersEdge, splitbarkBow } from "./weapons.js";

export * from "./artifacts.js";
export * from "./identities.js";
export * from "./minions.js";
export * from "./projects.js";
export * from "./schemes.js";
export * from "./spells.js";
export * from "./weapons.js";
export { STARTER_CHAMPION_DECK, STARTER_OVERLORD_DECK } from "./decks.js";

/** Every card constructor in the set; the catalog is built from this list. */
export const CARD_CONSTRUCTORS: ReadonlyArray<() => CardDefinition> = [
  regentOfAshes,
  wayfarerIlsen,
  lodestarPrism,
  sanctumKey,
  gatheringJar,
  starlitGate,
  maraudersEdge,
  splitbarkBow,
  ironrootMaul,
  pilfer,
  hollowSentry,
  ashenWarder,
  gravelOgre,
  thornwall,
  gildedMine,
  titheCollector,
  crownOfThorns,
  blackLedger,
  emberSigil,
  darkTithe,
];

export function createCatalog(): CardCatalog {
  return buildCatalog(CARD_CONSTRUCTORS);
}
