// Theme
export * from "./theme/color.js";
export * from "./theme/theme.js";
export * from "./theme/presets.js";
export * from "./theme/resolve.js";

// Config
export * from "./config/frame-config.js";
export * from "./config/slots.js";
export * from "./config/transfer.js";
export * from "./config/parse.js";

// Layout
export * from "./layout/layout-engine.js";

// Skins
export * from "./skins/frame-renderer.js";
export * from "./skins/cyberpunk.js";
export * from "./skins/retro-terminal.js";
export * from "./skins/registry.js";

// Rendering
export * from "./rendering/shapes.js";
export * from "./rendering/bitmap-font.js";
export * from "./rendering/glyph-cache.js";
export * from "./rendering/raster-surface.js";
export * from "./rendering/recording-surface.js";
export * from "./rendering/content-renderer.js";
export * from "./rendering/panel-composer.js";
export * from "./rendering/ascii-renderer.js";

// Panel
export * from "./panel/value-animator.js";
export * from "./panel/document.js";
export * from "./panel/panel.js";
