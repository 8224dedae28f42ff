/**
 * Fatal rule violation: a precondition the caller should have checked
 * (insufficient resources, illegal raid transition) or data that must exist
 * but does not. The enclosing action is rejected and nothing is committed.
 */
export class EngineInvariantError extends Error {
  constructor(context: string) {
    super(`[engine invariant] ${context}`);
    this.name = "EngineInvariantError";
  }
}

/** An action submitted in the wrong phase, by the wrong side, or not currently legal. */
export class IllegalActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IllegalActionError";
  }
}

export function expectDefined<T>(value: T | undefined, context: string): T {
  if (value === undefined) {
    throw new EngineInvariantError(context);
  }
  return value;
}

export function invariant(condition: boolean, context: string): asserts condition {
  if (!condition) {
    throw new EngineInvariantError(context);
  }
}
