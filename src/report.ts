import { excerpt } from "./preprocessing";
import { getDefaultRuleTable } from "./rules";
import type {
  PersonaResult,
  PersonaSection,
  TraitCategory,
  TraitResult,
} from "./types/persona";
import type { TextItem } from "./types/reddit";

const RULE = "========================================";
const MAX_CITATIONS = 3;

const BULLET_SECTIONS: ReadonlyArray<[Exclude<PersonaSection, "demographics">, string]> = [
  ["behaviors", "BEHAVIORS & HABITS"],
  ["motivations", "MOTIVATIONS"],
  ["personality", "PERSONALITY"],
  ["frustrations", "FRUSTRATIONS"],
  ["goals", "GOALS & NEEDS"],
];

interface Citation {
  item: TextItem;
  term?: string;
}

interface Bullet {
  text: string;
  citations: Citation[];
}

export interface ReportOptions {
  generatedAt?: Date;
  categories?: readonly TraitCategory[];
}

export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function formatDate(utcSeconds: number): string {
  return new Date(utcSeconds * 1000).toISOString().slice(0, 10);
}

function header(title: string): string[] {
  return [RULE, title, RULE];
}

function citationLines(citations: readonly Citation[]): string[] {
  const lines = ["  Citations:"];
  for (const { item, term } of citations.slice(0, MAX_CITATIONS)) {
    const type = item.kind === "post" ? "Post" : "Comment";
    lines.push(`    - ${type}: ${item.url}`);
    lines.push(`      "${excerpt(item, term)}"`);
  }
  if (citations.length > MAX_CITATIONS) {
    lines.push(`    (+${citations.length - MAX_CITATIONS} more)`);
  }
  return lines;
}

function traitCitations(trait: TraitResult): Citation[] {
  return trait.evidence.map(({ item, term }) => ({ item, term }));
}

function traitText(trait: TraitResult, category: TraitCategory): string {
  let text: string;
  if (category.template) {
    text = category.template.replace("{value}", trait.value.toLowerCase());
  } else if (trait.description) {
    text = `${trait.value}: ${trait.description}`;
  } else {
    text = trait.value;
  }
  return `${text} (${trait.label})`;
}

function bulletLines(bullets: readonly Bullet[]): string[] {
  const lines: string[] = [];
  for (const bullet of bullets) {
    lines.push(`• ${bullet.text}`);
    if (bullet.citations.length > 0) lines.push(...citationLines(bullet.citations));
    lines.push("");
  }
  return lines;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"}`;
}

/**
 * Renders a persona as the plain-text report written to disk. Sections
 * without content are left out, except demographics, which lists every
 * demographic category and "Unknown" where nothing matched.
 */
export function formatReport(
  persona: PersonaResult,
  options: ReportOptions = {}
): string {
  const generatedAt = options.generatedAt ?? new Date();
  const categories = options.categories ?? getDefaultRuleTable().categories;
  const { metadata } = persona;

  const lines: string[] = [
    ...header(`USER PERSONA: ${persona.username}`),
    "",
    `Generated on: ${formatDateTime(generatedAt)} (UTC)`,
    `Account created: ${formatDate(metadata.createdUtc)}`,
    `Account age: ${persona.accountAge}`,
    `Archetype: ${persona.archetype}`,
    `Link karma: ${metadata.linkKarma}`,
    `Comment karma: ${metadata.commentKarma}`,
    `Posts analyzed: ${persona.postsAnalyzed}`,
    `Comments analyzed: ${persona.commentsAnalyzed}`,
    "",
  ];

  if (persona.insufficientData) {
    lines.push("Note: Insufficient data - no public posts or comments were found.", "");
  }

  lines.push(...header("DEMOGRAPHICS"));
  for (const category of categories.filter((c) => c.section === "demographics")) {
    const trait = persona.traits[category.id]?.[0];
    if (!trait) {
      lines.push(`${category.label}: Unknown`);
      continue;
    }
    lines.push(`${category.label}: ${trait.value} (${trait.label})`);
    lines.push(...citationLines(traitCitations(trait)));
  }
  lines.push("");

  for (const [section, title] of BULLET_SECTIONS) {
    const bullets: Bullet[] = [];

    for (const category of categories.filter((c) => c.section === section)) {
      for (const trait of persona.traits[category.id] ?? []) {
        bullets.push({ text: traitText(trait, category), citations: traitCitations(trait) });
      }
    }
    for (const insight of persona.insights.filter((i) => i.section === section)) {
      bullets.push({
        text: insight.text,
        citations: insight.items.map((item) => ({ item })),
      });
    }

    if (bullets.length === 0) continue;
    lines.push(...header(title), ...bulletLines(bullets));
  }

  if (persona.topCommunities.length > 0) {
    lines.push(...header("TOP COMMUNITIES"));
    for (const community of persona.topCommunities) {
      lines.push(
        `• r/${community.subreddit} - ${plural(community.posts, "post")}, ${plural(
          community.comments,
          "comment"
        )}`
      );
    }
    lines.push("");
  }

  if (persona.places.length > 0) {
    lines.push(
      ...header("PLACES MENTIONED"),
      ...bulletLines(
        persona.places.map((place) => ({
          text: `${place.place} (${plural(place.mentions, "mention")})`,
          citations: place.items.map((item) => ({ item, term: place.place })),
        }))
      )
    );
  }

  return lines.join("\n");
}
