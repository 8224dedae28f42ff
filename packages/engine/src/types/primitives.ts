export type Side = "overlord" | "champion";

export type InnerRoomId = "vault" | "sanctum" | "crypts";
export type OuterRoomId = "room_a" | "room_b" | "room_c" | "room_d" | "room_e";
export type RoomId = InnerRoomId | OuterRoomId;

export const INNER_ROOMS: readonly InnerRoomId[] = ["vault", "sanctum", "crypts"];
export const OUTER_ROOMS: readonly OuterRoomId[] = ["room_a", "room_b", "room_c", "room_d", "room_e"];
export const ALL_ROOMS: readonly RoomId[] = [...INNER_ROOMS, ...OUTER_ROOMS];

/** Minions defend a room; projects and schemes occupy it. */
export type RoomLocation = "defender" | "occupant";
export type ItemLocation = "weapons" | "artifacts";

export type CardType =
  | "champion_spell"
  | "weapon"
  | "artifact"
  | "overlord_spell"
  | "minion"
  | "project"
  | "scheme"
  | "identity";

export type Rarity = "common" | "uncommon" | "rare" | "exalted";

/** Stable per-game card identifier, e.g. `"overlord:3"`. */
export type CardId = string;
export type RaidId = number;

/** Address of one ability instance: a card plus the index of the ability in its definition. */
export interface AbilityId {
  cardId: CardId;
  index: number;
}

export interface BoostData {
  cardId: CardId;
  count: number;
}

export function opponentSide(side: Side): Side {
  return side === "overlord" ? "champion" : "overlord";
}

export function isInnerRoom(room: RoomId): room is InnerRoomId {
  return room === "vault" || room === "sanctum" || room === "crypts";
}

export function cardIdFor(side: Side, index: number): CardId {
  return `${side}:${index}`;
}
