import * as z from "zod";

export interface EngineConfig {
  startingMana: number;
  actionsPerTurn: number;
  openingHandSize: number;
  pointsToWin: number;
  raidActionCost: number;
  levelUpCost: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
  startingMana: 5,
  actionsPerTurn: 3,
  openingHandSize: 5,
  pointsToWin: 7,
  raidActionCost: 1,
  levelUpCost: 1,
};

const count = z.number().int().nonnegative();

export const EngineConfigOverridesSchema = z
  .object({
    startingMana: count,
    actionsPerTurn: count,
    openingHandSize: count,
    pointsToWin: z.number().int().positive(),
    raidActionCost: count,
    levelUpCost: count,
  })
  .partial()
  .strict();

/**
 * Merge caller overrides onto DEFAULT_CONFIG. Unknown keys and negative or
 * fractional values are rejected.
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = EngineConfigOverridesSchema.parse(overrides);
  return { ...DEFAULT_CONFIG, ...parsed };
}
