/**
 * Course materials
 *
 * Turns material files into plain text for the analyzers' context. Only
 * plain-text formats are read here; slides, PDFs and documents are expected
 * to be converted before they reach the pipeline.
 */

import { promises as fs } from "fs";
import path from "path";
import { log, errorMessage } from "../logger";

export interface MaterialsProvider {
  load(filePaths: readonly string[]): Promise<string>;
}

export const TEXT_MATERIAL_EXTENSIONS = [".txt", ".md", ".csv"] as const;

function isTextMaterial(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return TEXT_MATERIAL_EXTENSIONS.some(candidate => candidate === extension);
}

export class FileMaterialsProvider implements MaterialsProvider {
  async load(filePaths: readonly string[]): Promise<string> {
    const sections: string[] = [];

    for (const filePath of filePaths) {
      const name = path.basename(filePath);

      if (!isTextMaterial(filePath)) {
        log(`[Materials] Unsupported format ${path.extname(filePath) || "(none)"}, skipping ${name}`, "materials", "warn");
        continue;
      }

      try {
        const text = (await fs.readFile(filePath, "utf-8")).trim();
        if (text) {
          sections.push(`=== Material: ${name} ===\n${text}`);
          log(`[Materials] Loaded ${name} (${text.length} chars)`, "materials");
        }
      } catch (error) {
        log(`[Materials] Failed to read ${filePath}: ${errorMessage(error)}`, "materials", "error");
      }
    }

    return sections.join("\n\n");
  }
}
