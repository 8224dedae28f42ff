import type { Delegate } from "./delegates.js";
import type { Game } from "./game.js";
import type { AbilityId, CardType, Rarity, RoomId, Side } from "./primitives.js";

export interface CardCost {
  /** Absent for cards that are never paid for with mana (schemes, identities). */
  mana?: number;
  actions: number;
}

export interface AttackBoost {
  /** Mana paid per activation */
  cost: number;
  /** Attack added per activation */
  bonus: number;
}

export interface SchemePoints {
  levelRequirement: number;
  points: number;
}

export interface CardStats {
  health?: number;
  attack?: number;
  shield?: number;
  breach?: number;
  attackBoost?: AttackBoost;
  schemePoints?: SchemePoints;
}

/** Decides which rooms an activated ability may target */
export type RoomTarget = (game: Game, abilityId: AbilityId, room: RoomId) => boolean;

export type AbilityType =
  | { type: "standard" }
  | { type: "encounter" }
  | { type: "activated"; cost: CardCost; target?: RoomTarget };

export interface Ability {
  text: string;
  abilityType: AbilityType;
  delegates: Delegate[];
}

export interface CardDefinition {
  name: string;
  cost: CardCost;
  cardType: CardType;
  side: Side;
  rarity: Rarity;
  abilities: Ability[];
  stats: CardStats;
}
