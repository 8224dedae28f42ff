import type { GameState } from "./types/state.js";

export interface StoredGame {
  state: GameState;
  /** Incremented on every save */
  version: number;
}

/** A save whose expected version is not the stored one: another action got there first. */
export class VersionConflictError extends Error {
  constructor(gameId: string, expected: number, actual: number) {
    super(`version mismatch for game ${gameId}: expected ${expected}, found ${actual}`);
    this.name = "VersionConflictError";
  }
}

/**
 * Persistence for game documents. One writer per game is assumed; `save`
 * enforces it with an optimistic version check.
 */
export interface GameStore {
  /** Store a new game at version 1 */
  insert(state: GameState): Promise<number>;
  load(gameId: string): Promise<StoredGame | undefined>;
  /** Returns the new version */
  save(gameId: string, state: GameState, expectedVersion: number): Promise<number>;
}

/** Keeps cloned documents in a map, so callers never share state with the store. */
export class InMemoryGameStore implements GameStore {
  private readonly games = new Map<string, StoredGame>();

  async insert(state: GameState): Promise<number> {
    if (this.games.has(state.id)) {
      throw new Error(`game ${state.id} already exists`);
    }
    this.games.set(state.id, { state: structuredClone(state), version: 1 });
    return 1;
  }

  async load(gameId: string): Promise<StoredGame | undefined> {
    const stored = this.games.get(gameId);
    if (stored === undefined) return undefined;
    return { state: structuredClone(stored.state), version: stored.version };
  }

  async save(gameId: string, state: GameState, expectedVersion: number): Promise<number> {
    const stored = this.games.get(gameId);
    const actual = stored?.version ?? 0;
    if (actual !== expectedVersion) {
      throw new VersionConflictError(gameId, expectedVersion, actual);
    }
    const version = actual + 1;
    this.games.set(gameId, { state: structuredClone(state), version });
    return version;
  }
}
