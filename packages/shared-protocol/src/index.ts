// Collaborator contract for the arena core

export * from "./types/index.js";
export * from "./constants/index.js";
export * from "./utils/number.js";
