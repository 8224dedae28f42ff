import { describe, expect, it } from "vitest";
import { buildDelegateCache, delegateCount, invokeEvent, performQuery } from "../dispatch.js";
import { actions, always, cost, eventDelegate, queryDelegate, thisCard } from "../helpers.js";
import { moveCard } from "../mutations.js";
import type { CardDefinition } from "../types/cards.js";
import { buildTestGame, testCatalog, type Placement } from "./fixtures.js";

function attackBonusCard(name: string, bonus: number): () => CardDefinition {
  return () => ({
    name,
    cost: cost(0),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [
      {
        text: `Weapons get +${bonus} attack.`,
        abilityType: { type: "standard" },
        delegates: [queryDelegate("attackValue", always, (_game, _scope, _cardId, current) => current + bonus)],
      },
      {
        text: `Weapons get ×2 attack.`,
        abilityType: { type: "standard" },
        delegates: [queryDelegate("attackValue", always, (_game, _scope, _cardId, current) => current * 2)],
      },
    ],
    stats: {},
  });
}

describe("delegate cache", () => {
  const catalog = testCatalog([attackBonusCard("Plus One", 1), attackBonusCard("Plus Five", 5)]);
  const placements: Placement[] = [
    { name: "Plus Five", side: "champion", position: { kind: "arena_item", location: "artifacts" } },
    { name: "Plus One", side: "champion", position: { kind: "arena_item", location: "artifacts" } },
    { name: "Plus One", side: "champion", position: { kind: "deck_unknown", side: "champion" } },
  ];

  it("lists delegates in card then ability order", () => {
    const game = buildTestGame(catalog, placements);
    const order = game.delegateCache.queries.attackValue.map((entry) => `${entry.scope.cardId}#${entry.scope.abilityId.index}`);
    expect(order).toEqual(["champion:0#0", "champion:0#1", "champion:1#0", "champion:1#1"]);
  });

  it("builds the same order for the same card collection", () => {
    const game = buildTestGame(catalog, placements);
    const first = buildDelegateCache(game.state, catalog).queries.attackValue.map((entry) => entry.scope.cardId);
    const second = buildDelegateCache(game.state, catalog).queries.attackValue.map((entry) => entry.scope.cardId);
    expect(second).toEqual(first);
  });

  it("folds query delegates in order and gives stable results", () => {
    const game = buildTestGame(catalog, placements);
    // ((0 + 5) * 2 + 1) * 2
    expect(performQuery(game, "attackValue", "champion:0", 0)).toBe(22);
    expect(performQuery(game, "attackValue", "champion:0", 0)).toBe(22);
  });

  it("leaves cards in the deck out of the cache", () => {
    const game = buildTestGame(catalog, placements);
    expect(delegateCount(game, "attackValue")).toBe(4);
  });

  it("freezes the published lists", () => {
    const game = buildTestGame(catalog, placements);
    expect(Object.isFrozen(game.delegateCache.queries.attackValue)).toBe(true);
  });
});

describe("invokeEvent", () => {
  it("keeps iterating the list read at dispatch start when an effect rebuilds the cache", () => {
    const calls: string[] = [];
    const summoner = (): CardDefinition => ({
      name: "Summoner",
      cost: cost(0),
      cardType: "artifact",
      side: "champion",
      rarity: "common",
      abilities: [
        {
          text: "Dawn: play the top card of your deck.",
          abilityType: { type: "standard" },
          delegates: [
            eventDelegate("onDawn", always, (game) => {
              calls.push("summoner");
              moveCard(game, "champion:1", { kind: "arena_item", location: "artifacts" });
            }),
          ],
        },
      ],
      stats: {},
    });
    const summoned = (): CardDefinition => ({
      name: "Summoned",
      cost: cost(0),
      cardType: "artifact",
      side: "champion",
      rarity: "common",
      abilities: [
        {
          text: "Dawn: record.",
          abilityType: { type: "standard" },
          delegates: [
            eventDelegate("onDawn", always, () => {
              calls.push("summoned");
            }),
          ],
        },
      ],
      stats: {},
    });
    const game = buildTestGame(testCatalog([summoner, summoned]), [
      { name: "Summoner", side: "champion", position: { kind: "arena_item", location: "artifacts" }, revealed: true },
      { name: "Summoned", side: "champion", position: { kind: "deck_unknown", side: "champion" } },
    ]);

    invokeEvent(game, "onDawn", 1);
    expect(calls).toEqual(["summoner"]);
    expect(delegateCount(game, "onDawn")).toBe(2);

    invokeEvent(game, "onDawn", 2);
    expect(calls).toEqual(["summoner", "summoner", "summoned"]);
  });

  it("stops at the first failing delegate and propagates its error", () => {
    const calls: string[] = [];
    const failing = (): CardDefinition => ({
      name: "Failing",
      cost: actions(0),
      cardType: "artifact",
      side: "champion",
      rarity: "common",
      abilities: [
        {
          text: "Fails.",
          abilityType: { type: "standard" },
          delegates: [
            eventDelegate("onPlayCard", thisCard, () => {
              calls.push("first");
              throw new Error("effect failed");
            }),
            eventDelegate("onPlayCard", thisCard, () => {
              calls.push("second");
            }),
          ],
        },
      ],
      stats: {},
    });
    const game = buildTestGame(testCatalog([failing]), [
      { name: "Failing", side: "champion", position: { kind: "arena_item", location: "artifacts" } },
    ]);

    expect(() => invokeEvent(game, "onPlayCard", "champion:0")).toThrow("effect failed");
    expect(calls).toEqual(["first"]);
  });

  it("skips delegates whose requirement does not hold", () => {
    const calls: string[] = [];
    const picky = (): CardDefinition => ({
      name: "Picky",
      cost: cost(0),
      cardType: "artifact",
      side: "champion",
      rarity: "common",
      abilities: [
        {
          text: "Records its own play.",
          abilityType: { type: "standard" },
          delegates: [
            eventDelegate("onPlayCard", thisCard, (_game, _scope, cardId) => {
              calls.push(cardId);
            }),
          ],
        },
      ],
      stats: {},
    });
    const game = buildTestGame(testCatalog([picky]), [
      { name: "Picky", side: "champion", position: { kind: "arena_item", location: "artifacts" } },
    ]);

    invokeEvent(game, "onPlayCard", "champion:7");
    invokeEvent(game, "onPlayCard", "champion:0");
    expect(calls).toEqual(["champion:0"]);
  });
});
