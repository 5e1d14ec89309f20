/**
 * Reading and writing panel documents on disk
 */

import { readFileSync, writeFileSync } from "fs";
import { decodePanelDocument, serializePanelDocument, type PanelDocument } from "@hudkit/engine";

/**
 * Read a panel document. A file that cannot be read is an error; a file
 * with bad contents reads as defaults.
 */
export function readPanelFile(path: string): PanelDocument {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new Error(`Cannot read panel file ${path}`, { cause: error });
  }
  return decodePanelDocument(text);
}

export function writePanelFile(path: string, document: PanelDocument): void {
  writeFileSync(path, serializePanelDocument(document) + "\n");
}
