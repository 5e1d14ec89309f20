#!/usr/bin/env node
/**
 * hudkit CLI
 *
 * Usage:
 *   npm run hudkit -- init panel.json --skin retro_terminal
 *   npm run hudkit -- render panel.json --width 160 --height 90 --simple
 *   npm run hudkit -- serve panel.json --port 8080
 */

import { existsSync } from "fs";
import { program } from "commander";
import { panelFromDocument } from "@hudkit/engine";
import {
  applyThemePreset,
  createDocument,
  describePresets,
  describeSkins,
  renderDocument,
  switchDocumentSkin,
  traceDocument,
  type AsciiStyle,
} from "./commands.js";
import { readPanelFile, writePanelFile } from "./panel-file.js";
import { PreviewServer } from "./preview-server.js";
import { SETTINGS_FILE, loadSettings, resolveSettings, saveSettings } from "./settings.js";

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Run a command body, reporting failures and exiting non-zero
 */
function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const settings = resolveSettings();

program
  .name("hudkit")
  .description("Render and edit themed multi-metric panels")
  .version("0.1.0");

program
  .command("render <file>")
  .description("Render a panel document as ASCII art")
  .option("--width <px>", "Panel width", parseInteger, settings.width)
  .option("--height <px>", "Panel height", parseInteger, settings.height)
  .option("--step <n>", "Sample every nth pixel", parseInteger, 1)
  .option("--time <seconds>", "Time fed to the demo metrics", parseInteger, 0)
  .option("--simple", "Plain ASCII characters")
  .option("--detailed", "Add row/column markers")
  .action((file: string, options: { width: number; height: number; step: number; time: number; simple?: boolean; detailed?: boolean }) =>
    run(() => {
      const style: AsciiStyle = options.simple ? "simple" : options.detailed ? "detailed" : "box";
      console.log(
        renderDocument(readPanelFile(file), {
          width: options.width,
          height: options.height,
          step: options.step,
          time: options.time,
          style,
        })
      );
    })
  );

program
  .command("skins")
  .description("List available skins")
  .action(() => {
    describeSkins().forEach((line) => console.log(line));
  });

program
  .command("presets")
  .description("List theme presets")
  .action(() => {
    describePresets().forEach((line) => console.log(line));
  });

program
  .command("theme <file> <preset>")
  .description("Apply a theme preset to a panel document")
  .action((file: string, preset: string) =>
    run(() => {
      writePanelFile(file, applyThemePreset(readPanelFile(file), preset));
      console.log(`Applied ${preset} to ${file}`);
    })
  );

program
  .command("switch <file> <skin>")
  .description("Switch a panel to another skin, keeping layout and content")
  .action((file: string, skin: string) =>
    run(() => {
      writePanelFile(file, switchDocumentSkin(readPanelFile(file), skin));
      console.log(`Switched ${file} to ${skin}`);
    })
  );

program
  .command("trace <file>")
  .description("Print the drawing calls of one render pass")
  .option("--width <px>", "Panel width", parseInteger, settings.width)
  .option("--height <px>", "Panel height", parseInteger, settings.height)
  .action((file: string, options: { width: number; height: number }) =>
    run(() => {
      traceDocument(readPanelFile(file), options.width, options.height).forEach((line) => console.log(line));
    })
  );

program
  .command("init <file>")
  .description("Create a panel document with every slot filled")
  .option("--skin <id>", "Skin to start from", settings.skin)
  .option("--groups <n>", "Number of groups", parseInteger)
  .option("--force", "Overwrite an existing file")
  .action((file: string, options: { skin: string; groups?: number; force?: boolean }) =>
    run(() => {
      if (existsSync(file) && !options.force) {
        throw new Error(`${file} already exists (use --force to overwrite)`);
      }
      writePanelFile(file, createDocument(options.skin, options.groups));
      console.log(`Created ${file} (${options.skin})`);
    })
  );

program
  .command("serve <file>")
  .description("Stream animated frames to WebSocket preview clients")
  .option("--width <px>", "Panel width", parseInteger, settings.width)
  .option("--height <px>", "Panel height", parseInteger, settings.height)
  .option("--port <port>", "WebSocket port", parseInteger, settings.port)
  .option("--interval <ms>", "Frame interval", parseInteger, settings.intervalMs)
  .option("--save", "Remember these options in the settings file")
  .action((file: string, options: { width: number; height: number; port: number; interval: number; save?: boolean }) =>
    run(() => {
      if (options.save) {
        saveSettings({
          ...loadSettings(),
          width: options.width,
          height: options.height,
          port: options.port,
          intervalMs: options.interval,
        });
        console.log(`Saved settings to ${SETTINGS_FILE}`);
      }

      const panel = panelFromDocument(readPanelFile(file));
      const server = new PreviewServer({
        panel,
        width: options.width,
        height: options.height,
        port: options.port,
        intervalMs: options.interval,
      });
      server.start();

      console.log(`Preview server started`);
      console.log(`  Panel: ${file} (${panel.skinName}, ${options.width}x${options.height})`);
      console.log(`  WebSocket: ws://localhost:${options.port}`);

      process.once("SIGINT", () => {
        server
          .stop()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error("[preview] Shutdown failed:", error);
            process.exit(1);
          });
      });
    })
  );

program.parse();
