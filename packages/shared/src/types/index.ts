export * from "./capsule.js";
export * from "./receipt.js";
export * from "./config.js";
