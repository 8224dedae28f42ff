import { describe, expect, it } from "vitest";
import {
  attack,
  attackBoost,
  boostsToDefeatTarget,
  canTakeAction,
  costToDefeatTarget,
  manaCost,
  startOfTurnActionCount,
  vaultAccessCount,
} from "../queries.js";
import { initiateRaid, setRaidPhase } from "../mutations.js";
import { cost } from "../helpers.js";
import type { CardDefinition } from "../types/cards.js";
import { buildTestGame, testCatalog } from "./fixtures.js";

function weapon(name: string, boostCost: number, bonus: number): () => CardDefinition {
  return () => ({
    name,
    cost: cost(0),
    cardType: "weapon",
    side: "champion",
    rarity: "common",
    abilities: [],
    stats: { attack: 3, breach: 1, attackBoost: { cost: boostCost, bonus } },
  });
}

function minion(name: string, health: number, shield: number): () => CardDefinition {
  return () => ({
    name,
    cost: cost(0),
    cardType: "minion",
    side: "overlord",
    rarity: "common",
    abilities: [],
    stats: { health, shield },
  });
}

const catalog = testCatalog([
  weapon("Boost Three", 3, 2),
  weapon("Dead Boost", 3, 0),
  minion("Wall Ten", 10, 2),
  minion("Wall Two", 2, 2),
  minion("Bare Two", 2, 0),
]);

function duel(attacker: string, defender: string) {
  return buildTestGame(catalog, [
    { name: attacker, side: "champion", position: { kind: "arena_item", location: "weapons" }, revealed: true },
    { name: defender, side: "overlord", position: { kind: "room", room: "vault", location: "defender" }, revealed: true },
  ]);
}

describe("costToDefeatTarget", () => {
  it("pays for enough boosts to cover the health deficit plus the unbroken shield", () => {
    const game = duel("Boost Three", "Wall Ten");
    // deficit 7, ceil(7 / 2) = 4 boosts at 3 mana, plus shield 2 - breach 1
    expect(boostsToDefeatTarget(game, "champion:0", "overlord:0")).toBe(4);
    expect(costToDefeatTarget(game, "champion:0", "overlord:0")).toBe(4 * 3 + 1);
  });

  it("charges only the shield when attack already covers health", () => {
    const game = duel("Boost Three", "Wall Two");
    expect(costToDefeatTarget(game, "champion:0", "overlord:0")).toBe(1);
  });

  it("never charges a negative shield cost", () => {
    const game = duel("Boost Three", "Bare Two");
    expect(costToDefeatTarget(game, "champion:0", "overlord:0")).toBe(0);
  });

  it("is undefined when the attacker has no boost and too little attack", () => {
    const game = duel("Test Club", "Wall Ten");
    expect(costToDefeatTarget(game, "champion:0", "overlord:0")).toBeUndefined();
  });

  it("is undefined when the boost adds nothing", () => {
    const game = duel("Dead Boost", "Wall Ten");
    expect(costToDefeatTarget(game, "champion:0", "overlord:0")).toBeUndefined();
  });
});

describe("base values", () => {
  it("defaults missing stats to zero", () => {
    const game = duel("Test Club", "Wall Ten");
    expect(attack(game, "overlord:0")).toBe(0);
    expect(attackBoost(game, "champion:0")).toBeUndefined();
  });

  it("reports no mana cost for schemes", () => {
    const game = buildTestGame(catalog, [
      { name: "Test Scheme", side: "overlord", position: { kind: "hand", side: "overlord" } },
    ]);
    expect(manaCost(game, "overlord:0")).toBeUndefined();
  });

  it("starts turns with the configured action count", () => {
    const game = buildTestGame(catalog, [], { config: { actionsPerTurn: 4 } });
    expect(startOfTurnActionCount(game, "champion")).toBe(4);
  });

  it("needs an active raid to count vault accesses", () => {
    const game = buildTestGame(catalog, []);
    expect(() => vaultAccessCount(game)).toThrow("expected an active raid");
    initiateRaid(game, "vault");
    expect(vaultAccessCount(game)).toBe(1);
  });
});

describe("canTakeAction", () => {
  it("follows the turn outside raids and the raid phase during them", () => {
    const game = buildTestGame(catalog, [], { turn: "champion" });
    expect(canTakeAction(game, "champion")).toBe(true);
    expect(canTakeAction(game, "overlord")).toBe(false);

    initiateRaid(game, "vault");
    setRaidPhase(game, "activation");
    expect(canTakeAction(game, "overlord")).toBe(true);
    expect(canTakeAction(game, "champion")).toBe(false);
  });
});
