import { describe, expect, it } from "vitest";
import { validateDeck } from "@ravenhold/engine";
import { CARD_CONSTRUCTORS, STARTER_CHAMPION_DECK, STARTER_OVERLORD_DECK, createCatalog } from "../index.js";

describe("card catalog", () => {
  const catalog = createCatalog();

  it("holds every card in the set", () => {
    expect(catalog.names()).toHaveLength(CARD_CONSTRUCTORS.length);
  });

  it("gives every weapon with a boost stat its boost ability", () => {
    for (const name of catalog.names()) {
      const definition = catalog.get(name);
      if (definition.stats.attackBoost === undefined) continue;
      expect(definition.abilities.some((ability) => ability.abilityType.type === "encounter")).toBe(true);
    }
  });

  it("builds valid starter decks", () => {
    expect(validateDeck(catalog, "overlord", STARTER_OVERLORD_DECK)).toEqual({ valid: true, errors: [] });
    expect(validateDeck(catalog, "champion", STARTER_CHAMPION_DECK)).toEqual({ valid: true, errors: [] });
  });
});
