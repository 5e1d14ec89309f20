/**
 * Combo panel
 *
 * Owns everything one on-screen panel needs between passes: the bound skin
 * (renderer instance + config), the latest metrics, the value animator and
 * the layout scratch buffers.
 */

import type { DrawingSurface, Frame, MetricSnapshot } from "@hudkit/core";
import { SurfaceError } from "@hudkit/core";
import type { FrameConfigBase } from "../config/frame-config.js";
import { extractTransferable } from "../config/transfer.js";
import type { PanelLayout } from "../layout/layout-engine.js";
import type { ContentItemRenderer } from "../rendering/content-renderer.js";
import type { ComposeResult } from "../rendering/panel-composer.js";
import { RasterSurface, type RasterSurfaceOptions } from "../rendering/raster-surface.js";
import { resolveSkin, type SkinBinding } from "../skins/registry.js";
import type { Theme } from "../theme/theme.js";
import { PANEL_DOCUMENT_VERSION, type PanelDocument } from "./document.js";
import { ValueAnimator } from "./value-animator.js";

export interface PanelOptions {
  /** Persisted config for the skin; defaults when absent */
  config?: unknown;
  contentRenderer?: ContentItemRenderer;
}

export type FrameResult = ComposeResult & { frame?: Frame };

function sameSnapshot(a: MetricSnapshot, b: MetricSnapshot): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.is(a[key], b[key]));
}

function frameDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export class ComboPanel {
  private binding: SkinBinding;
  private metrics: MetricSnapshot = {};
  private readonly animator = new ValueAnimator();
  private readonly scratch: PanelLayout = { groups: [], items: [] };
  private readonly contentRenderer: ContentItemRenderer | undefined;
  private dataDirty = true;

  constructor(binding: SkinBinding, contentRenderer?: ContentItemRenderer) {
    this.binding = binding;
    this.contentRenderer = contentRenderer;
  }

  get skinId(): string {
    return this.binding.skinId;
  }

  get skinName(): string {
    return this.binding.skinName;
  }

  get config(): FrameConfigBase {
    return this.binding.config;
  }

  /** Something changed since the last successful render */
  get dirty(): boolean {
    return this.dataDirty || this.animator.animating;
  }

  /**
   * Store a new snapshot and retarget animated values.
   * Returns whether the panel needs a redraw.
   */
  updateMetrics(snapshot: MetricSnapshot): boolean {
    const changed = !sameSnapshot(this.metrics, snapshot);
    this.metrics = { ...snapshot };
    const config = this.binding.config;
    const retargeted = this.animator.update(this.metrics, Object.keys(config.contentSlots), config.animationEnabled);
    if (changed || retargeted) this.dataDirty = true;
    return this.dirty;
  }

  render(surface: DrawingSurface, width: number, height: number, elapsedSeconds: number): ComposeResult {
    const config = this.binding.config;
    if (config.animationEnabled) {
      this.animator.step(elapsedSeconds, config.animationSpeed);
    } else {
      this.animator.settle();
    }

    const result = this.binding.compose({
      surface,
      width,
      height,
      elapsedSeconds,
      metrics: this.metrics,
      dataChanged: this.animator.animating,
      animatedFractions: this.animator.fractions(),
      scratch: this.scratch,
      ...(this.contentRenderer ? { contentRenderer: this.contentRenderer } : {}),
    });

    if (result.ok) this.dataDirty = false;
    return result;
  }

  /**
   * Render into a new pixel frame. Sizes are floored to whole pixels.
   */
  renderToFrame(width: number, height: number, elapsedSeconds: number, options: RasterSurfaceOptions = {}): FrameResult {
    let surface: RasterSurface;
    try {
      surface = new RasterSurface(frameDimension(width), frameDimension(height), options);
    } catch (error) {
      if (error instanceof SurfaceError) {
        console.warn("[panel] Could not allocate frame:", error.message);
        return { ok: false, error };
      }
      throw error;
    }

    const result = this.render(surface, surface.frame.width, surface.frame.height, elapsedSeconds);
    return result.ok ? { ...result, frame: surface.frame } : result;
  }

  /** Swap the palette; theme-referenced colors change on the next render */
  setTheme(theme: Theme): void {
    this.binding.setTheme(theme);
    this.dataDirty = true;
  }

  /**
   * Move to another skin, keeping layout, animation settings and slot
   * content, even before any slot is assigned. Decoration and theme come
   * from the new skin's defaults.
   */
  switchSkin(skinId: string): void {
    this.binding = resolveSkin(skinId).bindTransferred(extractTransferable(this.binding.config));
    this.dataDirty = true;
  }

  toDocument(): PanelDocument {
    return {
      version: PANEL_DOCUMENT_VERSION,
      skin: this.binding.skinId,
      config: structuredClone(this.binding.config),
    };
  }
}

export function createPanel(skinId: string, options: PanelOptions = {}): ComboPanel {
  return new ComboPanel(resolveSkin(skinId).bind(options.config), options.contentRenderer);
}

export function panelFromDocument(document: PanelDocument, contentRenderer?: ContentItemRenderer): ComboPanel {
  return createPanel(document.skin, {
    config: document.config,
    ...(contentRenderer ? { contentRenderer } : {}),
  });
}
