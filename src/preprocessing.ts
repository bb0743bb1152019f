/**
 * Text helpers shared by the engine and the report:
 * - Target parsing: usernames, u/name and profile URLs
 * - Tokenization for word counts
 * - Whitespace cleanup, truncation and citation excerpts
 */

import { InvalidTargetError } from "./errors";
import type { TextItem } from "./types/reddit";

const USERNAME_PATTERN = /^[A-Za-z0-9_-]{3,20}$/;
const PROFILE_URL_PATTERN =
  /^https?:\/\/(?:www\.|old\.|new\.)?reddit\.com\/(?:user|u)\/([A-Za-z0-9_-]{3,20})\/?(?:[?#].*)?$/i;
const SHORT_NAME_PATTERN = /^\/?u\/([A-Za-z0-9_-]{3,20})\/?$/i;

export const EXCERPT_LENGTH = 100;

export function parseTarget(input: string): string {
  const target = input.trim();

  const fromUrl = PROFILE_URL_PATTERN.exec(target);
  if (fromUrl?.[1]) return fromUrl[1];

  const fromShortName = SHORT_NAME_PATTERN.exec(target);
  if (fromShortName?.[1]) return fromShortName[1];

  if (/^https?:\/\//i.test(target)) {
    throw new InvalidTargetError(`Invalid Reddit profile URL: ${target}`);
  }
  if (!USERNAME_PATTERN.test(target)) {
    throw new InvalidTargetError(`Invalid Reddit username: ${target}`);
  }
  return target;
}

export function tokenize(text: string): string[] {
  const withoutUrls = text.replace(/https?:\/\/\S+/g, "");

  return withoutUrls
    .replace(/[^\w\s']|_/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase()
    .split(" ")
    .filter((token) => token.length > 0);
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncateText(text: string, maxLength: number = EXCERPT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + "...";
}

/** Title and body of an item, the text every rule is matched against. */
export function searchableText(item: TextItem): string {
  return item.title ? `${item.title}\n${item.body}` : item.body;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive pattern for `term` standing as a whole word or phrase. */
export function termPattern(term: string): RegExp {
  return new RegExp(`(?<![\\w])${escapeRegExp(term)}(?![\\w])`, "i");
}

/**
 * Quoted preview for a citation. The term is located on word boundaries,
 * as rules match it. When it would fall outside the first `maxLength`
 * characters, the window is moved to start shortly before it.
 */
export function excerpt(
  item: TextItem,
  term?: string,
  maxLength: number = EXCERPT_LENGTH
): string {
  const text = cleanText(searchableText(item));
  if (!text) return "[no text]";

  const index = term ? text.search(termPattern(term)) : -1;
  if (index === -1 || !term || index + term.length <= maxLength) {
    return truncateText(text, maxLength);
  }

  const start = Math.max(0, index - 40);
  const window = text.slice(start, start + maxLength);
  const suffix = start + maxLength < text.length ? "..." : "";
  return `...${window}${suffix}`;
}

export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[<>:"/\\|?*]/g, "_")
    .replace(/[^\w\s\-.]/g, "")
    .replace(/[_\s]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function parseBatchList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
