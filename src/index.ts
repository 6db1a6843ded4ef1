export * from "./config/index.js";
export * from "./decision/index.js";
export * from "./engine/index.js";
export * from "./errors.js";
export * from "./evidence/index.js";
export * from "./logging/index.js";
export * from "./pipeline/index.js";
export * from "./reasoning/index.js";
export * from "./report/index.js";
export * from "./rules/index.js";
export * from "./scoring/index.js";
export * from "./store/index.js";
