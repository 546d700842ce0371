import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";

const keywordListSchema = z
  .array(z.string().trim().min(1))
  .default([])
  .transform((words) => words.map((w) => w.toLowerCase()));

export const keywordConfigSchema = z.object({
  tabletop_keywords: keywordListSchema,
  digital_keywords: keywordListSchema,
});

export interface KeywordSets {
  tabletop: string[];
  digital: string[];
}

export function parseKeywords(raw: unknown): KeywordSets {
  const result = keywordConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid keyword configuration: ${issues}`);
  }
  return {
    tabletop: result.data.tabletop_keywords,
    digital: result.data.digital_keywords,
  };
}

/** Reads the keyword document (JSON) at `filePath`, relative to the working directory. */
export function loadKeywords(filePath: string): KeywordSets {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read keywords from ${resolved}: ${errorMessage(err)}`, { cause: err });
  }

  const keywords = parseKeywords(raw);
  console.log(
    `[keywords] Loaded ${keywords.tabletop.length} tabletop and ${keywords.digital.length} digital keywords`
  );
  return keywords;
}
