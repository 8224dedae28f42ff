/**
 * mutations.ts
 *
 * The only code that writes GameState. Every mutation:
 * 1. checks its preconditions and throws EngineInvariantError when they fail,
 * 2. applies the change,
 * 3. raises the matching events (delegates see the post-mutation state),
 * 4. appends one update record for the presentation layer.
 *
 * A mutation that finds nothing to change returns without an event or update.
 */

import type { Game } from "./types/game.js";
import type { AbilityState, CardPosition, CardState, GameState, Prompt, RaidData, RaidPhase } from "./types/state.js";
import type { GameUpdate, RaidOutcome } from "./types/updates.js";
import type { AbilityId, BoostData, CardId, RaidId, RoomId, Side } from "./types/primitives.js";
import { invokeEvent, populateDelegateCache } from "./dispatch.js";
import { activeRaid, definitionOf, findCard, player } from "./lookup.js";
import { hasLiveAbilities, inDeck, inHand, inPlay } from "./positions.js";
import { startOfTurnActionCount } from "./queries.js";
import { expectDefined, invariant } from "./internal/invariant.js";
import { moduleLogger } from "./logger.js";

const log = moduleLogger("mutations");

function pushUpdate(state: GameState, update: GameUpdate): void {
  state.updates.push(update);
}

function isWholeAmount(amount: number): boolean {
  return Number.isInteger(amount) && amount >= 0;
}

function positionAllowed(card: CardState, position: CardPosition): boolean {
  switch (position.kind) {
    case "room":
      return card.side === "overlord";
    case "arena_item":
      return card.side === "champion";
    case "scored":
      return true;
    default:
      return position.side === card.side;
  }
}

// ── Cards ────────────────────────────────────────────────────────

/**
 * Move a card to a new position, detecting draws, plays and destruction
 * (a return to an unknown deck position).
 *
 * An Overlord card entering its owner's hand or deck is hidden again. Any
 * other change to the revealed state is left to the caller.
 */
export function moveCard(game: Game, cardId: CardId, newPosition: CardPosition): void {
  const card = findCard(game.state, cardId);
  invariant(positionAllowed(card, newPosition), `mutations.moveCard ${cardId} cannot occupy ${newPosition.kind}`);
  log.debug("moveCard", { cardId, newPosition });

  const oldPosition = card.position;
  card.position = newPosition;
  if (card.side === "overlord" && (inHand(newPosition) || inDeck(newPosition))) {
    card.data.revealed = false;
  }
  card.sortingKey = game.state.nextSortingKey;
  game.state.nextSortingKey += 1;

  if (hasLiveAbilities(oldPosition) !== hasLiveAbilities(newPosition)) {
    populateDelegateCache(game);
  }

  invokeEvent(game, "onMoveCard", { cardId, oldPosition, newPosition });

  let pushedUpdate = false;
  if (inDeck(oldPosition) && inHand(newPosition)) {
    invokeEvent(game, "onDrawCard", cardId);
    pushUpdate(game.state, { type: "DRAW_CARD", cardId });
    pushedUpdate = true;
  }

  if (!inPlay(oldPosition) && inPlay(newPosition)) {
    invokeEvent(game, "onPlayCard", cardId);
  }

  if (newPosition.kind === "deck_unknown") {
    pushUpdate(game.state, { type: "DESTROY_CARD", cardId });
    pushedUpdate = true;
  }

  if (!pushedUpdate) {
    pushUpdate(game.state, { type: "MOVE_CARD", cardId });
  }
}

/** Raises onRevealCard only when a hidden card becomes revealed. */
export function setRevealed(game: Game, cardId: CardId, revealed: boolean): void {
  const card = findCard(game.state, cardId);
  const current = card.data.revealed;
  if (current === revealed) return;

  card.data.revealed = revealed;

  if (revealed) {
    invokeEvent(game, "onRevealCard", cardId);
    pushUpdate(game.state, { type: "REVEAL_CARD", cardId });
  } else {
    pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
  }
}

export function addLevel(game: Game, cardId: CardId): void {
  const card = findCard(game.state, cardId);
  card.data.cardLevel += 1;
  invokeEvent(game, "onLevelUp", cardId);
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
}

export function setAbilityState(game: Game, abilityId: AbilityId, patch: AbilityState): void {
  const card = findCard(game.state, abilityId.cardId);
  card.data.abilityState[abilityId.index] = { ...card.data.abilityState[abilityId.index], ...patch };
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId: abilityId.cardId });
}

// ── Mana & actions ───────────────────────────────────────────────

export function gainMana(game: Game, side: Side, amount: number): void {
  invariant(isWholeAmount(amount), `mutations.gainMana invalid amount ${amount}`);
  log.debug("gainMana", { side, amount });
  player(game.state, side).mana += amount;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

export function spendMana(game: Game, side: Side, amount: number): void {
  invariant(isWholeAmount(amount), `mutations.spendMana invalid amount ${amount}`);
  const target = player(game.state, side);
  invariant(target.mana >= amount, `insufficient mana: ${side} has ${target.mana}, needs ${amount}`);
  log.debug("spendMana", { side, amount });
  target.mana -= amount;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

export function spendActionPoints(game: Game, side: Side, amount: number): void {
  invariant(isWholeAmount(amount), `mutations.spendActionPoints invalid amount ${amount}`);
  const target = player(game.state, side);
  invariant(target.actions >= amount, `insufficient action points: ${side} has ${target.actions}, needs ${amount}`);
  log.debug("spendActionPoints", { side, amount });
  target.actions -= amount;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

/** Overwrite the mana stored on a card. */
export function setStoredMana(game: Game, cardId: CardId, amount: number): void {
  invariant(isWholeAmount(amount), `mutations.setStoredMana invalid amount ${amount}`);
  findCard(game.state, cardId).data.storedMana = amount;
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
}

/** Returns the new stored total */
export function addStoredMana(game: Game, cardId: CardId, amount: number): number {
  invariant(isWholeAmount(amount), `mutations.addStoredMana invalid amount ${amount}`);
  const card = findCard(game.state, cardId);
  card.data.storedMana += amount;
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
  return card.data.storedMana;
}

/**
 * Take up to `maximum` stored mana from a card and give it to the card's
 * owner. Never fails on an empty card: the amount taken is capped at what is
 * available, possibly zero, and onStoredManaTaken is raised either way.
 * Returns the amount taken.
 */
export function takeStoredMana(game: Game, cardId: CardId, maximum: number): number {
  invariant(isWholeAmount(maximum), `mutations.takeStoredMana invalid maximum ${maximum}`);
  const card = findCard(game.state, cardId);
  const taken = Math.min(card.data.storedMana, maximum);
  log.debug("takeStoredMana", { cardId, maximum, taken });

  card.data.storedMana -= taken;
  player(game.state, card.side).mana += taken;
  invokeEvent(game, "onStoredManaTaken", cardId);
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
  return taken;
}

// ── Boosts ───────────────────────────────────────────────────────

/** Boosts only exist during an encounter. */
export function writeBoost(game: Game, data: BoostData): void {
  invariant(isWholeAmount(data.count), `mutations.writeBoost invalid count ${data.count}`);
  invariant(
    game.state.raid !== null && game.state.raid.encounter !== null,
    "mutations.writeBoost requires an active encounter",
  );
  findCard(game.state, data.cardId).data.boostCount = data.count;
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId: data.cardId });
}

export function clearBoost(game: Game, cardId: CardId): void {
  const card = findCard(game.state, cardId);
  if (card.data.boostCount === 0) return;
  card.data.boostCount = 0;
  pushUpdate(game.state, { type: "UPDATE_CARD", cardId });
}

// ── Scoring & game end ───────────────────────────────────────────

export function declareWinner(game: Game, side: Side): void {
  invariant(game.state.phase === "play", "mutations.declareWinner game is already over");
  log.info("game over", { gameId: game.state.id, winner: side });
  game.state.phase = "game_over";
  game.state.winner = side;
  pushUpdate(game.state, { type: "GAME_OVER", winner: side });
}

/** Move a scheme to `side`'s score pile and award its points. */
export function scoreCard(game: Game, cardId: CardId, side: Side): void {
  const points = expectDefined(
    definitionOf(game, cardId).stats.schemePoints,
    `mutations.scoreCard ${cardId} is not a scheme`,
  ).points;
  invariant(findCard(game.state, cardId).position.kind !== "scored", `mutations.scoreCard ${cardId} already scored`);

  moveCard(game, cardId, { kind: "scored", side });
  const scorer = player(game.state, side);
  scorer.score += points;
  invokeEvent(game, "onScoreCard", cardId);
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });

  if (scorer.score >= game.state.config.pointsToWin && game.state.phase === "play") {
    declareWinner(game, side);
  }
}

// ── Turns ────────────────────────────────────────────────────────

/**
 * Hand the turn to `side` and grant its action points. The Overlord's turn
 * begins at dusk and advances the turn number; the Champion's begins at dawn.
 */
export function startTurn(game: Game, side: Side): void {
  const turnNumber = side === "overlord" ? game.state.turn.turnNumber + 1 : game.state.turn.turnNumber;
  game.state.turn = { side, turnNumber };
  player(game.state, side).actions = startOfTurnActionCount(game, side);
  log.debug("startTurn", { side, turnNumber });

  if (side === "overlord") {
    invokeEvent(game, "onDusk", turnNumber);
  } else {
    invokeEvent(game, "onDawn", turnNumber);
  }
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

// ── Prompts ──────────────────────────────────────────────────────

export function setPrompt(game: Game, side: Side, prompt: Prompt): void {
  const target = player(game.state, side);
  invariant(target.prompt === null, `player ${side} already has an active prompt`);
  target.prompt = prompt;
  pushUpdate(game.state, { type: "USER_PROMPT", side });
}

export function clearPrompts(game: Game): void {
  game.state.players.overlord.prompt = null;
  game.state.players.champion.prompt = null;
  pushUpdate(game.state, { type: "CLEAR_PROMPTS" });
}

// ── Raids ────────────────────────────────────────────────────────

/** Create raid data for a new raid on `room`. Fatal when a raid is already active. */
export function initiateRaid(game: Game, room: RoomId): RaidId {
  invariant(game.state.raid === null, "raid is already active");
  const raidId = game.state.nextRaidId;
  log.info("initiateRaid", { gameId: game.state.id, raidId, room });

  game.state.nextRaidId += 1;
  game.state.raid = { raidId, target: room, phase: "begin", encounter: null, active: false, accessed: [] };

  invokeEvent(game, "onRaidBegin", { raidId, target: room });
  pushUpdate(game.state, { type: "INITIATE_RAID", room });
  return raidId;
}

/**
 * End the active raid. Fatal when no raid is active. An encounter still in
 * progress ends first, so boosts do not outlive the raid.
 */
export function endRaid(game: Game, outcome: RaidOutcome): void {
  const raid: RaidData = activeRaid(game.state);
  log.info("endRaid", { gameId: game.state.id, raidId: raid.raidId, outcome });
  game.state.raid = null;

  if (raid.encounter !== null) {
    invokeEvent(game, "onEncounterEnd", raid.raidId);
  }
  if (outcome === "failure") {
    invokeEvent(game, "onRaidFailure", raid.raidId);
  }
  invokeEvent(game, "onRaidEnd", { raidId: raid.raidId, target: raid.target, outcome });

  if (game.state.players.overlord.prompt !== null || game.state.players.champion.prompt !== null) {
    clearPrompts(game);
  }
  pushUpdate(game.state, { type: "END_RAID", outcome });
}

export function setRaidPhase(game: Game, phase: RaidPhase): void {
  activeRaid(game.state).phase = phase;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

export function setEncounter(game: Game, encounter: CardId | null): void {
  activeRaid(game.state).encounter = encounter;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

export function setRaidActive(game: Game): void {
  activeRaid(game.state).active = true;
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}

export function recordAccess(game: Game, cardIds: CardId[]): void {
  activeRaid(game.state).accessed = [...cardIds];
  pushUpdate(game.state, { type: "UPDATE_GAME_STATE" });
}
