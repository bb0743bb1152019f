import type { TextItem, UserMetadata } from "./reddit";

export type PersonaSection =
  | "demographics"
  | "behaviors"
  | "motivations"
  | "personality"
  | "frustrations"
  | "goals";

export type CategoryMode = "single" | "multi";

export interface TraitCategory {
  id: string;
  label: string;
  section: PersonaSection;
  mode: CategoryMode;
  maxValues: number;
  template?: string; // e.g. "Shows strong interest in {value}"
}

export interface TraitRule {
  id: string;
  category: string;
  value: string;
  description?: string;
  keywords: readonly string[];
  patterns: readonly string[];
  subreddits: readonly string[];
  weight: number;
}

export interface RuleTable {
  categories: readonly TraitCategory[];
  rules: readonly TraitRule[];
}

export interface Evidence {
  item: TextItem;
  ruleId: string;
  term: string; // The keyword, pattern match or subreddit that fired
}

export type ConfidenceLevel = "low" | "moderate" | "strong";

export interface TraitResult {
  category: string;
  value: string;
  description?: string;
  score: number;
  confidence: number; // 0..1
  level: ConfidenceLevel;
  label: string;
  evidence: Evidence[];
}

export type TraitMap = Record<string, TraitResult[]>;

export interface ActivityInsight {
  id: string;
  section: Exclude<PersonaSection, "demographics">;
  text: string;
  items: TextItem[];
}

export interface CommunityActivity {
  subreddit: string;
  posts: number;
  comments: number;
  total: number;
}

export interface PlaceMention {
  place: string;
  mentions: number;
  items: TextItem[];
}

export interface PersonaResult {
  username: string;
  metadata: UserMetadata;
  postsAnalyzed: number;
  commentsAnalyzed: number;
  insufficientData: boolean;
  archetype: string;
  accountAge: string;
  traits: TraitMap;
  insights: ActivityInsight[];
  topCommunities: CommunityActivity[];
  places: PlaceMention[];
}
