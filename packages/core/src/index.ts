export * from "./types.js";
export * from "./frame.js";
export * from "./surface.js";
export * from "./errors.js";
