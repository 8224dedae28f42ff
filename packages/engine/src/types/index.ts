export * from "./primitives.js";
export * from "./cards.js";
export * from "./state.js";
export * from "./delegates.js";
export * from "./updates.js";
export * from "./actions.js";
export * from "./config.js";
export * from "./game.js";
