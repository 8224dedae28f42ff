import type { Game } from "../types/game.js";
import type { Side } from "../types/primitives.js";
import { opponentSide } from "../types/primitives.js";
import { startTurn } from "../mutations.js";
import { IllegalActionError } from "../internal/invariant.js";
import { moduleLogger } from "../logger.js";
import { drawCards } from "./play.js";

const log = moduleLogger("rules.turns");

/** Start `side`'s turn: dusk or dawn, action points, then one card drawn. */
export function beginTurn(game: Game, side: Side): void {
  startTurn(game, side);
  if (game.state.phase !== "play") return;
  drawCards(game, side, 1);
}

export function endTurnError(game: Game, side: Side): string | null {
  if (game.state.phase !== "play") return "The game is over";
  if (game.state.turn.side !== side) return `It is not the ${side}'s turn`;
  if (game.state.raid !== null) return "A raid is in progress";
  if (game.state.players.overlord.prompt !== null || game.state.players.champion.prompt !== null) {
    return "A prompt is pending";
  }
  return null;
}

export function endTurn(game: Game, side: Side): void {
  const reason = endTurnError(game, side);
  if (reason !== null) {
    throw new IllegalActionError(reason);
  }
  log.debug("endTurn", { side, turnNumber: game.state.turn.turnNumber });
  beginTurn(game, opponentSide(side));
}

/** Deal each side its opening hand, Overlord first. */
export function dealOpeningHands(game: Game): void {
  for (const side of ["overlord", "champion"] as const) {
    drawCards(game, side, game.state.config.openingHandSize);
  }
}
