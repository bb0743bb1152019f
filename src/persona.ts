import {
  accountArchetype,
  analyzeActivity,
  describeAccountAge,
  topCommunities,
} from "./activity";
import { logger } from "./logger";
import { compromisePlaces, extractPlaces, type PlaceExtractor } from "./ner";
import { getDefaultRuleTable, type CompiledRuleTable } from "./rules";
import { vaderTone, type ToneScorer } from "./sentiment";
import { inferTraits } from "./traits";
import type { PersonaResult } from "./types/persona";
import type { CollectedUser } from "./types/reddit";

export interface PersonaOptions {
  rules?: CompiledRuleTable;
  now?: Date;
  tone?: ToneScorer;
  places?: PlaceExtractor;
}

/**
 * Turns collected activity into a persona. A user with no posts and no
 * comments still gets a persona, flagged as having insufficient data.
 */
export function buildPersona(
  user: CollectedUser,
  options: PersonaOptions = {}
): PersonaResult {
  const rules = options.rules ?? getDefaultRuleTable();
  const now = options.now ?? new Date();
  const items = [...user.posts, ...user.comments];
  const { metadata } = user;

  const base = {
    username: metadata.username,
    metadata,
    postsAnalyzed: user.posts.length,
    commentsAnalyzed: user.comments.length,
    archetype: accountArchetype(metadata.createdUtc, now),
    accountAge: describeAccountAge(metadata.createdUtc, now),
  };

  if (items.length === 0) {
    logger.warn(`⚠️ No posts or comments available for u/${metadata.username}`);
    return {
      ...base,
      insufficientData: true,
      traits: {},
      insights: [],
      topCommunities: [],
      places: [],
    };
  }

  const traits = inferTraits(items, rules);
  logger.debug(
    `🧮 u/${metadata.username}: ${Object.keys(traits).length} trait categories matched`
  );

  return {
    ...base,
    insufficientData: false,
    traits,
    insights: analyzeActivity(user, options.tone ?? vaderTone),
    topCommunities: topCommunities(user),
    places: extractPlaces(items, options.places ?? compromisePlaces),
  };
}
