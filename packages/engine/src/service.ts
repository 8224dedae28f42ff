/**
 * service.ts
 *
 * The load / apply / save loop used by transport layers:
 * 1. Validate the untrusted request.
 * 2. Load the game document and check the expected version.
 * 3. Apply the action against the loaded game.
 * 4. Save with the version check and return the drained updates.
 *
 * Failures of any kind come back as a generic rejection; the detail is only
 * logged.
 */

import type { CardCatalog, Game } from "./types/game.js";
import type { GameUpdate } from "./types/updates.js";
import type { GameOptions } from "./engine.js";
import { applyAction, createGame, drainUpdates, loadGame } from "./engine.js";
import { VersionConflictError, type GameStore } from "./store.js";
import { SubmitActionSchema } from "./validators.js";
import { moduleLogger } from "./logger.js";

const log = moduleLogger("service");

export const ACTION_REJECTED = "Action rejected";

export type SubmitActionResponse =
  | { ok: true; version: number; updates: GameUpdate[] }
  | { ok: false; error: typeof ACTION_REJECTED };

const REJECTED: SubmitActionResponse = { ok: false, error: ACTION_REJECTED };

/** Create a game and store it; returns its id and first version. */
export async function startGame(store: GameStore, options: GameOptions): Promise<{ gameId: string; version: number }> {
  const game = createGame(options);
  drainUpdates(game);
  const version = await store.insert(game.state);
  return { gameId: game.state.id, version };
}

export async function submitAction(
  store: GameStore,
  catalog: CardCatalog,
  request: unknown,
): Promise<SubmitActionResponse> {
  const parsed = SubmitActionSchema.safeParse(request);
  if (!parsed.success) {
    log.warn("malformed action request", { issues: parsed.error.issues.map((issue) => issue.message) });
    return REJECTED;
  }

  const { gameId, side, action, expectedVersion } = parsed.data;
  const stored = await store.load(gameId);
  if (stored === undefined) {
    log.warn("unknown game", { gameId });
    return REJECTED;
  }
  if (stored.version !== expectedVersion) {
    log.warn("submitAction version mismatch", { gameId, expectedVersion, version: stored.version });
    return REJECTED;
  }

  let game: Game;
  try {
    game = loadGame(stored.state, catalog);
  } catch (error) {
    log.error("failed to load game", { gameId, error: error instanceof Error ? error.message : String(error) });
    return REJECTED;
  }

  const result = applyAction(game, side, action);
  if (!result.ok) {
    log.warn("action failed", { gameId, side, action: action.type, reason: result.reason, message: result.message });
    return REJECTED;
  }

  const updates = drainUpdates(result.game);
  try {
    const version = await store.save(gameId, result.game.state, expectedVersion);
    return { ok: true, version, updates };
  } catch (error) {
    if (error instanceof VersionConflictError) {
      log.warn("submitAction version mismatch on save", { gameId, message: error.message });
      return REJECTED;
    }
    throw error;
  }
}
