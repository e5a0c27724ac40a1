export * from "./types.js";
export * from "./occupancy.js";
export * from "./level.js";
