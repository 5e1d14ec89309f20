/**
 * Live preview server
 *
 * Renders a panel on a fixed interval with synthetic metrics and pushes
 * each frame to every connected WebSocket client. New clients get the last
 * frame immediately.
 *
 * Message format:
 *   { type: "frame", payload: { skin, frame: { width, height, data } }, timestamp }
 * where `data` is the base64 RGB frame.
 */

import { WebSocketServer, WebSocket } from "ws";
import { encodeFrame } from "@hudkit/core";
import type { ComboPanel } from "@hudkit/engine";
import { demoMetrics } from "./demo-metrics.js";

export interface PreviewServerOptions {
  panel: ComboPanel;
  width: number;
  height: number;
  port: number;
  intervalMs: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

export interface FrameMessage {
  type: "frame";
  payload: {
    skin: string;
    frame: { width: number; height: number; data: string };
  };
  timestamp: number;
}

export class PreviewServer {
  private readonly options: PreviewServerOptions;
  private readonly now: () => number;
  private readonly clients = new Set<WebSocket>();
  private wss: WebSocketServer | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private cachedMessage: string | null = null;
  private startedAt = 0;
  private lastTick: number | null = null;
  private skinWantsRedraw = true;

  framesRendered = 0;

  constructor(options: PreviewServerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  start(): void {
    if (this.wss) return;

    const wss = new WebSocketServer({ port: this.options.port });
    wss.on("connection", (ws: WebSocket) => {
      this.clients.add(ws);
      console.log(`[preview] Client connected (total: ${this.clients.size})`);
      if (this.cachedMessage) {
        ws.send(this.cachedMessage);
      }
      ws.on("close", () => {
        this.clients.delete(ws);
        console.log(`[preview] Client disconnected (total: ${this.clients.size})`);
      });
    });
    wss.on("error", (error: Error) => {
      console.error("[preview] Server error:", error);
    });
    this.wss = wss;

    this.startedAt = this.now();
    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
  }

  /**
   * Render and broadcast one frame if anything changed.
   * Returns whether a frame was sent.
   */
  tick(): boolean {
    const { panel, width, height } = this.options;
    const now = this.now();
    const elapsed = this.lastTick === null ? 0 : (now - this.lastTick) / 1000;
    this.lastTick = now;

    panel.updateMetrics(demoMetrics(panel.config, (now - this.startedAt) / 1000));
    if (!panel.dirty && !this.skinWantsRedraw && this.cachedMessage !== null) {
      return false;
    }

    const result = panel.renderToFrame(width, height, elapsed);
    if (!result.ok) {
      console.warn("[preview] Frame failed:", result.error.message);
      return false;
    }
    if (!result.frame) return false;

    this.skinWantsRedraw = result.needsRedraw;
    const message: FrameMessage = {
      type: "frame",
      payload: {
        skin: panel.skinId,
        frame: { width: result.frame.width, height: result.frame.height, data: encodeFrame(result.frame) },
      },
      timestamp: now,
    };
    this.cachedMessage = JSON.stringify(message);
    this.framesRendered++;
    this.broadcast(this.cachedMessage);
    return true;
  }

  stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const wss = this.wss;
    this.wss = null;
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
    if (!wss) return Promise.resolve();

    return new Promise((resolve, reject) => {
      wss.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }

  private broadcast(message: string): void {
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }
}
