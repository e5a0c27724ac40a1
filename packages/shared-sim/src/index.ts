// Navigation surface builder, path planner and steering shared by the arena
// host and its tools

export * from "./navmesh/index.js";
export * from "./movement/index.js";
export * from "@arena/shared";
