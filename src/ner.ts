import nlp from "compromise";
import { searchableText } from "./preprocessing";
import type { PlaceMention } from "./types/persona";
import type { TextItem } from "./types/reddit";

/** Finds place names in a piece of text. */
export type PlaceExtractor = (text: string) => string[];

export const compromisePlaces: PlaceExtractor = (text) => {
  const found: unknown = nlp(text).places().out("array");
  if (!Array.isArray(found)) return [];
  return found.filter((place): place is string => typeof place === "string");
};

function normalizePlace(text: string): string {
  return text
    .trim()
    .replace(/^[^\w]+|[^\w]+$/g, "")
    .replace(/\s+/g, " ");
}

/**
 * Counts distinct places across items. Places are grouped case-insensitively
 * and keep the spelling of their first mention; ties keep first-seen order.
 */
export function extractPlaces(
  items: readonly TextItem[],
  extractor: PlaceExtractor = compromisePlaces,
  limit = 5
): PlaceMention[] {
  const byKey = new Map<string, PlaceMention>();

  for (const item of items) {
    const seenInItem = new Set<string>();
    for (const raw of extractor(searchableText(item))) {
      const place = normalizePlace(raw);
      if (place.length <= 2) continue;

      const key = place.toLowerCase();
      let mention = byKey.get(key);
      if (!mention) {
        mention = { place, mentions: 0, items: [] };
        byKey.set(key, mention);
      }
      mention.mentions++;
      if (!seenInItem.has(key)) {
        seenInItem.add(key);
        mention.items.push(item);
      }
    }
  }

  return [...byKey.values()]
    .map((mention, position) => ({ mention, position }))
    .sort((a, b) => b.mention.mentions - a.mention.mentions || a.position - b.position)
    .slice(0, limit)
    .map(({ mention }) => mention);
}
