/**
 * Legacy FAQ / greeting cache import
 * Pre-generated JSON arrays of { question, response_text, emotion?, audio_b64? }
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../types.js";
import type { InstantAnswerCache } from "./instant-answer-cache.js";
import { generateId } from "../utils/embedding.js";
import { silentLogger } from "../utils/logger.js";
import { StorageCorruption, getErrorMessage } from "../errors.js";

const legacyEntrySchema = z.object({
  question: z.string().min(1),
  response_text: z.string().min(1),
  emotion: z.string().optional(),
  audio_b64: z.string().nullish(),
}).passthrough();

export interface LegacyImportResult {
  imported: number;
  skipped: number;
}

export async function importLegacyCache(
  cache: InstantAnswerCache,
  file: string,
  audioDir: string,
  logger: Logger = silentLogger
): Promise<LegacyImportResult> {
  let raw: unknown;
  try {
    let content = await readFile(file, "utf-8");
    if (content.charCodeAt(0) === 0xfeff) content = content.slice(1);
    raw = JSON.parse(content);
  } catch (err) {
    throw new StorageCorruption(`Cannot read legacy cache ${file}: ${getErrorMessage(err)}`, 0, err);
  }
  if (!Array.isArray(raw)) {
    throw new StorageCorruption(`Legacy cache ${file} is not a JSON array`, 0);
  }

  let imported = 0, skipped = 0;
  for (let i = 0; i < raw.length; i++) {
    const parsed = legacyEntrySchema.safeParse(raw[i]);
    if (!parsed.success) {
      logger.warn(`[legacy-import] Entry ${i} skipped: ${parsed.error.issues[0].message}`);
      skipped++;
      continue;
    }
    const { question, response_text, audio_b64, ...rest } = parsed.data;
    if (cache.findExact(question).length > 0) {
      skipped++;
      continue;
    }

    try {
      let audio = "";
      if (audio_b64) {
        // one payload in memory at a time
        await mkdir(audioDir, { recursive: true });
        audio = join(audioDir, `faq_${generateId()}.mp3`);
        await writeFile(audio, Buffer.from(audio_b64, "base64"));
      }
      await cache.cacheStore(question, response_text, audio, { ...rest, source: rest.source ?? "legacy" });
      imported++;
    } catch (err) {
      logger.warn(`[legacy-import] "${question.slice(0, 20)}" not imported: ${getErrorMessage(err)}`);
      skipped++;
    }
  }

  logger.info(`[legacy-import] ${file}: imported ${imported}, skipped ${skipped}`);
  return { imported, skipped };
}
