export * from "./navmesh-generator.js";
export * from "./navcat-surface.js";
export * from "./seam-clearance.js";
export * from "./path-planner.js";
