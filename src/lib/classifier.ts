import { Category } from "./types";
import type { KeywordSets } from "./keywords";

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((word) => text.includes(word));
}

/**
 * Resolve a jam's category. A stored tabletop/digital category is returned
 * untouched; otherwise tabletop keywords are checked in the description
 * first, then digital keywords in the description and the name.
 */
export function classify(
  description: string,
  name: string,
  existingCategory: Category | null,
  keywords: KeywordSets
): Category {
  if (existingCategory !== null && existingCategory !== Category.UNCLASSIFIED) {
    return existingCategory;
  }

  const desc = description.toLowerCase();
  if (containsAny(desc, keywords.tabletop)) return Category.TABLETOP;

  if (containsAny(desc, keywords.digital) || containsAny(name.toLowerCase(), keywords.digital)) {
    return Category.DIGITAL;
  }

  return Category.UNCLASSIFIED;
}
