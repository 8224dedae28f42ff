import type { CardPosition, CardState } from "./types/state.js";
import type { Side } from "./types/primitives.js";

/** In a room or played as an item */
export function inPlay(position: CardPosition): boolean {
  return position.kind === "room" || position.kind === "arena_item";
}

export function inHand(position: CardPosition): boolean {
  return position.kind === "hand";
}

export function inDeck(position: CardPosition): boolean {
  return position.kind === "deck_unknown" || position.kind === "deck_top";
}

export function inDiscardPile(position: CardPosition): boolean {
  return position.kind === "discard_pile";
}

export function inScorePile(position: CardPosition): boolean {
  return position.kind === "scored";
}

/**
 * Cards outside the decks have their abilities indexed in the delegate
 * cache. Requirements decide whether a given ability applies where the
 * card currently is.
 */
export function hasLiveAbilities(position: CardPosition): boolean {
  return !inDeck(position);
}

export function isRevealedTo(card: CardState, side: Side): boolean {
  if (card.position.kind === "deck_unknown") return false;
  if (card.side === side) return true;
  return card.data.revealed;
}

export function isFaceDown(card: CardState): boolean {
  return !card.data.revealed;
}
