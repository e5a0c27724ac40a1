// Types shared with the collaborators that render, score and feed contacts

export * from "./agents.js";
export * from "./event-log.js";
export * from "./arena-events.js";
