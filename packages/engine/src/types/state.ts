import type { EngineConfig } from "./config.js";
import type { RaidAction } from "./actions.js";
import type { GameUpdate } from "./updates.js";
import type { CardId, ItemLocation, RaidId, RoomId, RoomLocation, Side } from "./primitives.js";

export type CardPosition =
  /** Somewhere in a deck, order unknown to both players. The default for every non-identity card. */
  | { kind: "deck_unknown"; side: Side }
  /** Known to at least one player to be on top of a deck */
  | { kind: "deck_top"; side: Side }
  | { kind: "hand"; side: Side }
  | { kind: "room"; room: RoomId; location: RoomLocation }
  | { kind: "arena_item"; location: ItemLocation }
  | { kind: "discard_pile"; side: Side }
  | { kind: "scored"; side: Side }
  | { kind: "identity"; side: Side };

export type CardPositionKind = CardPosition["kind"];

export interface AbilityState {
  raidId?: RaidId;
  turnNumber?: number;
  roomTurns?: Partial<Record<RoomId, number>>;
}

export interface CardData {
  /** Has this card been revealed to the opponent? */
  revealed: boolean;
  cardLevel: number;
  /** Boost activations applied during the current encounter */
  boostCount: number;
  storedMana: number;
  abilityState: Record<number, AbilityState>;
}

export interface CardState {
  id: CardId;
  /** Key into the card catalog */
  name: string;
  side: Side;
  position: CardPosition;
  /** Display order within a position; taken from a counter when the card moves. */
  sortingKey: number;
  data: CardData;
}

export type PromptKind = "activate_room" | "encounter" | "access";

export interface Prompt {
  kind: PromptKind;
  responses: RaidAction[];
}

export interface PlayerState {
  id: string;
  mana: number;
  actions: number;
  score: number;
  prompt: Prompt | null;
}

export type RaidPhase = "begin" | "activation" | "encounter" | "access";

export interface RaidData {
  raidId: RaidId;
  target: RoomId;
  phase: RaidPhase;
  /** The defender currently being encountered */
  encounter: CardId | null;
  /** True once the Overlord activated the room */
  active: boolean;
  accessed: CardId[];
}

export interface TurnData {
  side: Side;
  turnNumber: number;
}

export type GamePhase = "play" | "game_over";

export interface GameState {
  id: string;
  config: EngineConfig;
  players: Record<Side, PlayerState>;
  /** Every card in the game, in creation order */
  cards: CardState[];
  raid: RaidData | null;
  nextRaidId: RaidId;
  nextSortingKey: number;
  turn: TurnData;
  phase: GamePhase;
  winner: Side | null;
  /** Append-only; drained by the presentation layer after each action. */
  updates: GameUpdate[];
}
