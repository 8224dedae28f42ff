import { describe, expect, it } from "vitest";
import { storeManaOnPlay } from "../abilities.js";
import { activateAbility, playCard } from "../rules/play.js";
import { scoreCard, startTurn } from "../mutations.js";
import { invokeEvent } from "../dispatch.js";
import { findCard } from "../lookup.js";
import { cost } from "../helpers.js";
import type { CardDefinition } from "../types/cards.js";
import { buildTestGame, testCatalog } from "./fixtures.js";

function hoard(amount: number): () => CardDefinition {
  return () => ({
    name: `Hoard ${amount}`,
    cost: cost(0),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [storeManaOnPlay(amount)],
    stats: {},
  });
}

describe("storeManaOnPlay", () => {
  const catalog = testCatalog([hoard(1), hoard(3), hoard(9)]);

  it.each([1, 3, 9])("stores %i mana when the card is played", (amount) => {
    const game = buildTestGame(
      catalog,
      [{ name: `Hoard ${amount}`, side: "champion", position: { kind: "hand", side: "champion" } }],
      { turn: "champion" },
    );

    playCard(game, "champion", "champion:0");

    const card = findCard(game.state, "champion:0");
    expect(card.position).toEqual({ kind: "arena_item", location: "artifacts" });
    expect(card.data.storedMana).toBe(amount);
  });
});

describe("activatedTakeMana", () => {
  it("moves stored mana to the owner and discards the card once it is empty", () => {
    const game = buildTestGame(
      testCatalog(),
      [{ name: "Test Cache", side: "champion", position: { kind: "hand", side: "champion" } }],
      { turn: "champion", actions: 4 },
    );
    const takeMana = { cardId: "champion:0", index: 1 };

    playCard(game, "champion", "champion:0");
    expect(game.state.players.champion.mana).toBe(8);

    activateAbility(game, "champion", takeMana);
    activateAbility(game, "champion", takeMana);
    expect(findCard(game.state, "champion:0").data.storedMana).toBe(2);
    expect(findCard(game.state, "champion:0").position.kind).toBe("arena_item");

    activateAbility(game, "champion", takeMana);
    expect(game.state.players.champion.mana).toBe(14);
    expect(game.state.players.champion.actions).toBe(0);
    expect(findCard(game.state, "champion:0").position).toEqual({ kind: "discard_pile", side: "champion" });
  });
});

describe("dusk projects", () => {
  it("unveils a face-down project, stores mana and takes from it in the same dusk", () => {
    const game = buildTestGame(testCatalog(), [
      { name: "Test Mine", side: "overlord", position: { kind: "room", room: "room_a", location: "occupant" } },
    ]);

    startTurn(game, "overlord");

    const mine = findCard(game.state, "overlord:0");
    expect(mine.data.revealed).toBe(true);
    // paid 2 to unveil, then took 2 of the 6 stored
    expect(game.state.players.overlord.mana).toBe(10);
    expect(mine.data.storedMana).toBe(4);
  });

  it("keeps taking each dusk until the project is empty", () => {
    const game = buildTestGame(testCatalog(), [
      { name: "Test Mine", side: "overlord", position: { kind: "room", room: "room_a", location: "occupant" } },
    ]);

    startTurn(game, "overlord");
    startTurn(game, "overlord");
    startTurn(game, "overlord");

    expect(game.state.players.overlord.mana).toBe(14);
    expect(findCard(game.state, "overlord:0").position).toEqual({ kind: "discard_pile", side: "overlord" });
  });

  it("stays face down when the overlord cannot pay to unveil", () => {
    const game = buildTestGame(
      testCatalog(),
      [{ name: "Test Mine", side: "overlord", position: { kind: "room", room: "room_a", location: "occupant" } }],
      { mana: 1 },
    );

    startTurn(game, "overlord");

    expect(findCard(game.state, "overlord:0").data.revealed).toBe(false);
    expect(game.state.players.overlord.mana).toBe(1);
  });

  it("does nothing at dawn", () => {
    const game = buildTestGame(testCatalog(), [
      { name: "Test Mine", side: "overlord", position: { kind: "room", room: "room_a", location: "occupant" } },
    ]);

    startTurn(game, "champion");

    expect(findCard(game.state, "overlord:0").data.revealed).toBe(false);
  });
});

describe("scheme score rewards", () => {
  it("pays nothing when the champion scores the scheme", () => {
    const game = buildTestGame(testCatalog(), [
      { name: "Test Scheme", side: "overlord", position: { kind: "room", room: "room_a", location: "occupant" } },
    ]);

    scoreCard(game, "overlord:0", "champion");

    expect(game.state.players.overlord.mana).toBe(10);
    expect(game.state.players.champion.score).toBe(3);
  });
});

describe("strike", () => {
  it("does nothing when the champion's hand is empty", () => {
    const game = buildTestGame(
      testCatalog(),
      [{ name: "Test Brute", side: "overlord", position: { kind: "room", room: "vault", location: "defender" }, revealed: true }],
      { turn: "champion" },
    );
    const updatesBefore = game.state.updates.length;

    invokeEvent(game, "onMinionCombatAbility", { raidId: 1, defenderId: "overlord:0" });

    expect(game.state.updates).toHaveLength(updatesBefore);
  });
});
