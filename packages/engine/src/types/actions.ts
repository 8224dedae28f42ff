import type { AbilityId, CardId, RoomId } from "./primitives.js";

export type RaidAction =
  | { type: "activate_room" }
  | { type: "pass_activation" }
  | { type: "use_weapon"; weaponId: CardId }
  | { type: "no_weapon" }
  | { type: "retreat" }
  | { type: "score_card"; cardId: CardId }
  | { type: "end_raid" };

export type GameAction =
  | { type: "DRAW_CARD" }
  | { type: "GAIN_MANA" }
  | { type: "PLAY_CARD"; cardId: CardId; room?: RoomId }
  | { type: "ACTIVATE_ABILITY"; abilityId: AbilityId; room?: RoomId }
  | { type: "LEVEL_UP_ROOM"; room: RoomId }
  | { type: "INITIATE_RAID"; room: RoomId }
  | { type: "RAID_ACTION"; action: RaidAction }
  | { type: "END_TURN" };
