// @ravenhold/engine
// Rules engine for a two-sided raid card game: delegates, mutations, queries and raids
export * from "./types/index.js";
export { EngineInvariantError, IllegalActionError } from "./internal/invariant.js";
export { logger, moduleLogger } from "./logger.js";
export { buildCatalog, CardDefinitionSchema } from "./registry.js";
export {
  buildDelegateCache,
  createScope,
  delegateCount,
  invokeEvent,
  isEventKind,
  isQueryKind,
  performQuery,
  populateDelegateCache,
} from "./dispatch.js";
export * as mutations from "./mutations.js";
export * as queries from "./queries.js";
export * from "./helpers.js";
export * as abilities from "./abilities.js";
export * as lookup from "./lookup.js";
export { hasLiveAbilities, inDeck, inDiscardPile, inHand, inPlay, inScorePile, isFaceDown, isRevealedTo } from "./positions.js";
export { deckCardNames, DeckSchema, validateDeck } from "./deck.js";
export type { Deck, DeckValidation } from "./deck.js";
export { applyAction, createEngine, createGame, drainUpdates, loadGame } from "./engine.js";
export type { ActionResult, Engine, GameOptions } from "./engine.js";
export { legalActions } from "./rules/legalActions.js";
export { handleRaidAction, raidActions, raidDisplayState, startRaid } from "./rules/raid/core.js";
export type { PhaseTransition, RaidDisplayState, RaidPhaseHandler } from "./rules/raid/types.js";
export { InMemoryGameStore, VersionConflictError } from "./store.js";
export type { GameStore, StoredGame } from "./store.js";
export { GameActionSchema, RaidActionSchema, SubmitActionSchema } from "./validators.js";
export type { SubmitActionRequest } from "./validators.js";
export { ACTION_REJECTED, startGame, submitAction } from "./service.js";
export type { SubmitActionResponse } from "./service.js";
