import type { RaidAction } from "../../types/actions.js";
import type { Game } from "../../types/game.js";
import type { PromptKind, RaidPhase } from "../../types/state.js";
import type { CardId, Side } from "../../types/primitives.js";

/** What happens after a phase is entered or handles an action. */
export type PhaseTransition =
  | { kind: "advance"; phase: RaidPhase }
  /** Stay in the current phase and prompt the active side */
  | { kind: "await_input" }
  /** The raid is over; raid data is gone. */
  | { kind: "resolved" };

export type RaidDisplayState =
  | { kind: "none" }
  | { kind: "defenders"; defenders: CardId[] }
  | { kind: "encounter"; defenderId: CardId; weapons: CardId[] }
  | { kind: "access"; accessed: CardId[] };

export interface RaidPhaseHandler {
  readonly phase: RaidPhase;
  /** Side empowered to act while this phase awaits input */
  readonly activeSide: Side;
  readonly promptKind: PromptKind | null;
  /** Raise the phase-entry event and decide whether to move on. */
  enter(game: Game): PhaseTransition;
  /** Legal actions for the active side. Empty means the phase never waits. */
  actions(game: Game): RaidAction[];
  handleAction(game: Game, action: RaidAction): PhaseTransition;
  displayState(game: Game): RaidDisplayState;
}

export function advance(phase: RaidPhase): PhaseTransition {
  return { kind: "advance", phase };
}

export const AWAIT_INPUT: PhaseTransition = { kind: "await_input" };
export const RESOLVED: PhaseTransition = { kind: "resolved" };
