import { describe, expect, it } from "vitest";
import { DeckSchema, deckCardNames, validateDeck } from "../deck.js";
import { testCatalog } from "./fixtures.js";

const catalog = testCatalog();

describe("deckCardNames", () => {
  it("lists the identity first, then each card by name and copy count", () => {
    const names = deckCardNames({ identity: "Test Champion Identity", cards: { "Test Windfall": 1, "Test Blade": 2 } });

    expect(names).toEqual(["Test Champion Identity", "Test Blade", "Test Blade", "Test Windfall"]);
  });
});

describe("validateDeck", () => {
  it("accepts a deck of the side's own cards", () => {
    const result = validateDeck(catalog, "overlord", {
      identity: "Test Overlord Identity",
      cards: { "Test Sentinel": 2, "Test Scheme": 3 },
    });

    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("collects every problem", () => {
    const result = validateDeck(catalog, "champion", {
      identity: "Test Overlord Identity",
      cards: { "Test Scheme": 1, "Test Champion Identity": 1, Missing: 2 },
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Identity "Test Overlord Identity" belongs to the overlord',
      '"Test Scheme" belongs to the overlord',
      '"Test Champion Identity" is an identity',
      'Unknown card "Missing"',
    ]);
  });

  it("rejects an identity that is not an identity card", () => {
    const result = validateDeck(catalog, "champion", { identity: "Test Blade", cards: {} });

    expect(result.errors).toEqual(['"Test Blade" is not an identity']);
  });
});

describe("DeckSchema", () => {
  it("rejects zero or fractional copy counts", () => {
    expect(DeckSchema.safeParse({ identity: "Test Champion Identity", cards: { "Test Blade": 0 } }).success).toBe(false);
    expect(DeckSchema.safeParse({ identity: "Test Champion Identity", cards: { "Test Blade": 1.5 } }).success).toBe(false);
    expect(DeckSchema.safeParse({ identity: "Test Champion Identity", cards: { "Test Blade": 2 } }).success).toBe(true);
  });
});
