import fs from "fs-extra";
import path from "path";
import { logger } from "./logger";
import { sanitizeFilename } from "./preprocessing";
import type { PersonaResult } from "./types/persona";

export function personaPath(outputDir: string, username: string, ext: "txt" | "json"): string {
  return path.join(outputDir, `${sanitizeFilename(username)}_persona.${ext}`);
}

/**
 * Writes the text report, and the persona as JSON when asked. Returns the
 * paths written.
 */
export async function savePersona(
  outputDir: string,
  persona: PersonaResult,
  report: string,
  options: { json?: boolean } = {}
): Promise<string[]> {
  try {
    await fs.ensureDir(outputDir);

    const reportPath = personaPath(outputDir, persona.username, "txt");
    await fs.writeFile(reportPath, report, "utf8");
    const written = [reportPath];

    if (options.json) {
      const jsonPath = personaPath(outputDir, persona.username, "json");
      await fs.writeJson(jsonPath, persona, { spaces: 2 });
      written.push(jsonPath);
    }

    logger.info(`✅ Persona saved to: ${written.join(", ")}`);
    return written;
  } catch (error) {
    logger.error(`❌ Failed to save persona for u/${persona.username}:`, error);
    throw error;
  }
}

export async function readBatchFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}
