// Grid model, navigation surface types and gameplay constants shared by the
// simulation and the arena host

export * from "@arena/shared-protocol";

export * from "./constants/index.js";

export * from "./grid/index.js";

export * from "./navmesh/index.js";
