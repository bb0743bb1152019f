import { SentimentIntensityAnalyzer } from "vader-sentiment";
import { searchableText } from "./preprocessing";
import type { TextItem } from "./types/reddit";

/** Returns a compound polarity in [-1, 1] for a piece of text. */
export type ToneScorer = (text: string) => number;

export interface ScoredItem {
  item: TextItem;
  compound: number;
}

export const vaderTone: ToneScorer = (text) =>
  SentimentIntensityAnalyzer.polarity_scores(text).compound;

export function scoreItems(
  items: readonly TextItem[],
  scorer: ToneScorer = vaderTone
): ScoredItem[] {
  return items.map((item) => ({
    item,
    compound: scorer(searchableText(item)),
  }));
}

/**
 * Items at or below `threshold`, most negative first. Equal scores keep
 * collection order.
 */
export function mostNegative(
  scored: readonly ScoredItem[],
  threshold: number
): ScoredItem[] {
  return scored
    .map((entry, position) => ({ entry, position }))
    .filter(({ entry }) => entry.compound <= threshold)
    .sort((a, b) => a.entry.compound - b.entry.compound || a.position - b.position)
    .map(({ entry }) => entry);
}
