export * from "./commands.js";
export * from "./demo-metrics.js";
export * from "./panel-file.js";
export * from "./preview-server.js";
export * from "./settings.js";
