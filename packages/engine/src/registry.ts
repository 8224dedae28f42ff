/**
 * registry.ts
 *
 * The card catalog maps a card name to its definition. It is built once,
 * from an explicit list of definition constructors, before any game starts
 * and is frozen afterwards.
 */

import * as z from "zod";
import type { CardDefinition } from "./types/cards.js";
import type { CardCatalog } from "./types/game.js";
import { isEventKind, isQueryKind } from "./dispatch.js";
import { EngineInvariantError } from "./internal/invariant.js";
import { moduleLogger } from "./logger.js";

const log = moduleLogger("registry");

const amount = z.number().int().nonnegative();

const CardCostSchema = z.object({
  mana: amount.optional(),
  actions: amount,
});

const CardStatsSchema = z.object({
  health: amount.optional(),
  attack: amount.optional(),
  shield: amount.optional(),
  breach: amount.optional(),
  attackBoost: z.object({ cost: amount, bonus: amount }).optional(),
  schemePoints: z
    .object({ levelRequirement: z.number().int().positive(), points: z.number().int().positive() })
    .optional(),
});

const DelegateSchema = z.object({
  family: z.enum(["event", "query"]),
  kind: z.string(),
});

const AbilitySchema = z.object({
  text: z.string(),
  abilityType: z.discriminatedUnion("type", [
    z.object({ type: z.literal("standard") }),
    z.object({ type: z.literal("encounter") }),
    z.object({ type: z.literal("activated"), cost: CardCostSchema, target: z.function().optional() }),
  ]),
  delegates: z.array(DelegateSchema),
});

export const CardDefinitionSchema = z
  .object({
    name: z.string().min(1),
    cost: CardCostSchema,
    cardType: z.enum([
      "champion_spell",
      "weapon",
      "artifact",
      "overlord_spell",
      "minion",
      "project",
      "scheme",
      "identity",
    ]),
    side: z.enum(["overlord", "champion"]),
    rarity: z.enum(["common", "uncommon", "rare", "exalted"]),
    abilities: z.array(AbilitySchema),
    stats: CardStatsSchema,
  })
  .superRefine((definition, ctx) => {
    if (definition.cardType === "scheme" && definition.stats.schemePoints === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "schemes require schemePoints", path: ["stats"] });
    }
    definition.abilities.forEach((ability, abilityIndex) => {
      ability.delegates.forEach((delegate, delegateIndex) => {
        const known = delegate.family === "event" ? isEventKind(delegate.kind) : isQueryKind(delegate.kind);
        if (!known) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown ${delegate.family} kind "${delegate.kind}"`,
            path: ["abilities", abilityIndex, "delegates", delegateIndex],
          });
        }
      });
    });
  });

function freezeDefinition(definition: CardDefinition): CardDefinition {
  for (const ability of definition.abilities) {
    Object.freeze(ability.delegates);
    Object.freeze(ability);
  }
  Object.freeze(definition.abilities);
  Object.freeze(definition.cost);
  Object.freeze(definition.stats);
  return Object.freeze(definition);
}

/**
 * Build the catalog from card definition constructors. Throws if a
 * definition is malformed or a name is declared twice.
 */
export function buildCatalog(constructors: ReadonlyArray<() => CardDefinition>): CardCatalog {
  const definitions = new Map<string, CardDefinition>();

  for (const construct of constructors) {
    const definition = construct();
    const result = CardDefinitionSchema.safeParse(definition);
    if (!result.success) {
      const detail = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new EngineInvariantError(`invalid card definition "${definition.name}": ${detail}`);
    }
    if (definitions.has(definition.name)) {
      throw new EngineInvariantError(`duplicate card definition "${definition.name}"`);
    }
    definitions.set(definition.name, freezeDefinition(definition));
  }

  log.info("card catalog built", { cards: definitions.size });

  return Object.freeze({
    get(name: string): CardDefinition {
      const definition = definitions.get(name);
      if (!definition) {
        throw new EngineInvariantError(`no card definition named "${name}"`);
      }
      return definition;
    },
    has(name: string): boolean {
      return definitions.has(name);
    },
    names(): string[] {
      return [...definitions.keys()];
    },
  });
}
