import type { CardId, RoomId, Side } from "./primitives.js";

export type RaidOutcome = "success" | "failure";

export type GameUpdate =
  | { type: "DRAW_CARD"; cardId: CardId }
  | { type: "MOVE_CARD"; cardId: CardId }
  | { type: "DESTROY_CARD"; cardId: CardId }
  | { type: "REVEAL_CARD"; cardId: CardId }
  | { type: "UPDATE_CARD"; cardId: CardId }
  | { type: "UPDATE_GAME_STATE" }
  | { type: "USER_PROMPT"; side: Side }
  | { type: "CLEAR_PROMPTS" }
  | { type: "INITIATE_RAID"; room: RoomId }
  | { type: "END_RAID"; outcome: RaidOutcome }
  | { type: "GAME_OVER"; winner: Side };
