import * as z from "zod";
import type { CardCatalog } from "./types/game.js";
import type { Side } from "./types/primitives.js";

export interface Deck {
  /** Name of the identity card */
  identity: string;
  /** Card name to number of copies */
  cards: Record<string, number>;
}

export const DeckSchema = z.object({
  identity: z.string().min(1),
  cards: z.record(z.string().min(1), z.number().int().positive()),
});

/** Every card in the deck, identity first, then the rest alphabetically by name. */
export function deckCardNames(deck: Deck): string[] {
  const names = Object.keys(deck.cards).sort();
  const expanded = names.flatMap((name) => Array.from({ length: deck.cards[name] ?? 0 }, () => name));
  return [deck.identity, ...expanded];
}

export interface DeckValidation {
  valid: boolean;
  errors: string[];
}

export function validateDeck(catalog: CardCatalog, side: Side, deck: Deck): DeckValidation {
  const errors: string[] = [];

  if (!catalog.has(deck.identity)) {
    errors.push(`Unknown identity "${deck.identity}"`);
  } else {
    const identity = catalog.get(deck.identity);
    if (identity.cardType !== "identity") errors.push(`"${deck.identity}" is not an identity`);
    if (identity.side !== side) errors.push(`Identity "${deck.identity}" belongs to the ${identity.side}`);
  }

  for (const name of Object.keys(deck.cards)) {
    if (!catalog.has(name)) {
      errors.push(`Unknown card "${name}"`);
      continue;
    }
    const definition = catalog.get(name);
    if (definition.side !== side) errors.push(`"${name}" belongs to the ${definition.side}`);
    if (definition.cardType === "identity") errors.push(`"${name}" is an identity`);
  }

  return { valid: errors.length === 0, errors };
}
