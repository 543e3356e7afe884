export * from "./checker/index.js";
export * from "./analysis/index.js";
export * from "./scoring/index.js";
export * from "./report/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
