export * from "./steering.js";
