export * from "./event-log.js";
export * from "./event-log-buffer.js";
export * from "./constants.js";
