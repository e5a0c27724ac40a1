// Process-level services shared by arena hosts

export * from "./logger.js";
