import { tokenize, searchableText } from "./preprocessing";
import { mostNegative, scoreItems, type ToneScorer } from "./sentiment";
import type { ActivityInsight, CommunityActivity } from "./types/persona";
import type { CollectedUser, TextItem } from "./types/reddit";

const DAY_SECONDS = 24 * 3600;

export const ACTIVITY_THRESHOLDS = {
  commentToPostRatio: 2,
  diverseCommunities: 5,
  knowledgeSharingComments: 10,
  communityBuilderComments: 15,
  highlyEngagedComments: 20,
  detailedAverageWords: 100,
  negativeCompound: -0.5,
  negativeItems: 3,
};

function distinctCommunities(items: readonly TextItem[]): Map<string, TextItem> {
  const firstItem = new Map<string, TextItem>();
  for (const item of items) {
    const key = item.subreddit.toLowerCase();
    if (key && !firstItem.has(key)) firstItem.set(key, item);
  }
  return firstItem;
}

/**
 * Count-based insights about how a user behaves, each carrying the items
 * that support it. Returns nothing for a user without activity.
 */
export function analyzeActivity(
  user: CollectedUser,
  tone: ToneScorer
): ActivityInsight[] {
  const { posts, comments } = user;
  const items = [...posts, ...comments];
  const insights: ActivityInsight[] = [];
  const t = ACTIVITY_THRESHOLDS;

  if (items.length === 0) return insights;

  if (comments.length > 0 && comments.length > posts.length * t.commentToPostRatio) {
    insights.push({
      id: "prefers-commenting",
      section: "behaviors",
      text: "Prefers commenting over posting - more reactive than proactive",
      items: comments.slice(0, 3),
    });
  }

  const communities = distinctCommunities(items);
  if (communities.size > t.diverseCommunities) {
    insights.push({
      id: "diverse-communities",
      section: "behaviors",
      text: "Engages across diverse communities and topics",
      items: [...communities.values()].slice(0, 3),
    });
  }

  if (comments.length > t.knowledgeSharingComments) {
    insights.push({
      id: "knowledge-sharing",
      section: "motivations",
      text: "Motivated to share knowledge and help others",
      items: comments.slice(0, 3),
    });
  }

  if (comments.length > t.highlyEngagedComments) {
    insights.push({
      id: "highly-engaged",
      section: "personality",
      text: "Highly Engaged: Actively participates in discussions and community interactions",
      items: comments.slice(0, 3),
    });
  }

  const wordCounts = items.map((item) => tokenize(searchableText(item)).length);
  const totalWords = wordCounts.reduce((sum, count) => sum + count, 0);
  if (totalWords / items.length > t.detailedAverageWords) {
    const longest = items
      .map((item, position) => ({ item, words: wordCounts[position], position }))
      .sort((a, b) => b.words - a.words || a.position - b.position)
      .slice(0, 2)
      .map(({ item }) => item);

    insights.push({
      id: "detailed-communicator",
      section: "personality",
      text: "Detailed Communicator: Tends to provide comprehensive explanations and detailed responses",
      items: longest,
    });
  }

  if (comments.length > t.communityBuilderComments) {
    insights.push({
      id: "community-builder",
      section: "goals",
      text: "Build connections and contribute to online communities",
      items: comments.slice(0, 3),
    });
  }

  const negative = mostNegative(scoreItems(items, tone), t.negativeCompound);
  if (negative.length >= t.negativeItems) {
    insights.push({
      id: "negative-tone",
      section: "frustrations",
      text: "Frequently writes with a strongly negative tone",
      items: negative.slice(0, 3).map(({ item }) => item),
    });
  }

  return insights;
}

/** Subreddits ranked by posts + comments; ties keep first-seen order. */
export function topCommunities(
  user: CollectedUser,
  limit = 10
): CommunityActivity[] {
  const counts = new Map<string, CommunityActivity>();

  const bump = (item: TextItem) => {
    if (!item.subreddit) return;
    const key = item.subreddit.toLowerCase();
    let entry = counts.get(key);
    if (!entry) {
      entry = { subreddit: item.subreddit, posts: 0, comments: 0, total: 0 };
      counts.set(key, entry);
    }
    if (item.kind === "post") entry.posts++;
    else entry.comments++;
    entry.total++;
  };

  user.posts.forEach(bump);
  user.comments.forEach(bump);

  return [...counts.values()]
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => b.entry.total - a.entry.total || a.position - b.position)
    .slice(0, limit)
    .map(({ entry }) => entry);
}

export function accountArchetype(createdUtc: number, now: Date): string {
  const ageDays = (now.getTime() / 1000 - createdUtc) / DAY_SECONDS;
  if (ageDays > 365 * 3) return "Long-term Reddit user";
  if (ageDays > 365) return "Regular Reddit user";
  return "Newer Reddit user";
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"}`;
}

/** Human-readable account age using 365-day years and 30-day months. */
export function describeAccountAge(createdUtc: number, now: Date): string {
  const days = Math.max(
    0,
    Math.floor((now.getTime() / 1000 - createdUtc) / DAY_SECONDS)
  );
  const years = Math.floor(days / 365);
  const months = Math.floor((days % 365) / 30);

  if (years > 0) return `${plural(years, "year")}, ${plural(months, "month")}`;
  if (months > 0) return `${plural(months, "month")}, ${plural(days % 30, "day")}`;
  return plural(days, "day");
}
