/**
 * Skin registry
 *
 * Each entry creates fresh renderer instances, since renderers hold
 * per-panel animation state. A bound skin (SkinBinding) pairs one renderer
 * with its config and hides the concrete config type from the panel.
 */

import type { FrameConfigBase } from "../config/frame-config.js";
import { withTheme } from "../config/frame-config.js";
import { applyTransferable, type TransferableConfig } from "../config/transfer.js";
import { composePanel, type ComposeInput, type ComposeResult } from "../rendering/panel-composer.js";
import type { Theme } from "../theme/theme.js";
import { CyberpunkRenderer } from "./cyberpunk.js";
import type { FrameRenderer } from "./frame-renderer.js";
import { RetroTerminalRenderer } from "./retro-terminal.js";

export type BoundComposeInput = Omit<ComposeInput<FrameConfigBase>, "config" | "renderer">;

export interface SkinBinding {
  readonly skinId: string;
  readonly skinName: string;
  readonly config: FrameConfigBase;
  setTheme(theme: Theme): void;
  compose(input: BoundComposeInput): ComposeResult;
}

export interface SkinEntry {
  readonly id: string;
  readonly name: string;
  defaultConfig(): FrameConfigBase;
  parseConfig(raw: unknown): FrameConfigBase;
  /** New renderer with a parsed config, or the defaults when `rawConfig` is undefined */
  bind(rawConfig?: unknown): SkinBinding;
  /** New renderer with default decoration and the given layout/content */
  bindTransferred(transferable: TransferableConfig): SkinBinding;
}

function bindRenderer<C extends FrameConfigBase>(renderer: FrameRenderer<C>, initial: C): SkinBinding {
  let config = initial;
  return {
    skinId: renderer.skinId,
    skinName: renderer.skinName,
    get config(): FrameConfigBase {
      return config;
    },
    setTheme(theme: Theme): void {
      config = withTheme(config, theme);
    },
    compose(input: BoundComposeInput): ComposeResult {
      return composePanel({ ...input, config, renderer });
    },
  };
}

export function defineSkin<C extends FrameConfigBase>(create: () => FrameRenderer<C>): SkinEntry {
  const template = create();
  return {
    id: template.skinId,
    name: template.skinName,
    defaultConfig: () => template.defaultConfig(),
    parseConfig: (raw) => template.parseConfig(raw),
    bind(rawConfig?: unknown): SkinBinding {
      const renderer = create();
      const config = rawConfig === undefined ? renderer.defaultConfig() : renderer.parseConfig(rawConfig);
      return bindRenderer(renderer, config);
    },
    bindTransferred(transferable: TransferableConfig): SkinBinding {
      const renderer = create();
      return bindRenderer(renderer, applyTransferable(renderer.defaultConfig(), transferable));
    },
  };
}

export const DEFAULT_SKIN_ID = "cyberpunk";

const SKINS: readonly SkinEntry[] = [
  defineSkin(() => new CyberpunkRenderer()),
  defineSkin(() => new RetroTerminalRenderer()),
];

export function getSkin(id: string): SkinEntry | undefined {
  return SKINS.find((skin) => skin.id === id);
}

export function getSkinIds(): string[] {
  return SKINS.map((skin) => skin.id);
}

export function listSkins(): Array<{ id: string; name: string }> {
  return SKINS.map((skin) => ({ id: skin.id, name: skin.name }));
}

/**
 * Look up a skin, falling back to the default skin for unknown ids
 */
export function resolveSkin(id: string): SkinEntry {
  const skin = getSkin(id);
  if (skin) return skin;

  console.warn(`[registry] Unknown skin "${id}", using ${DEFAULT_SKIN_ID}`);
  const fallback = getSkin(DEFAULT_SKIN_ID);
  if (!fallback) {
    throw new Error(`Default skin ${DEFAULT_SKIN_ID} is not registered`);
  }
  return fallback;
}
