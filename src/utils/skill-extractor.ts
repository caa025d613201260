import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PATTERNS_PATH = fileURLToPath(new URL('../../data/skill-patterns.json', import.meta.url));

export const SKILL_CATEGORIES = ['technical', 'business', 'leadership', 'methodologies', 'industry'] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

const termGroup = z.array(z.string().min(1)).min(1);

const skillPatternsSchema = z.object({
  vocabulary: z.array(z.string().min(1)),
  categories: z.object({
    technical: z.array(termGroup),
    business: z.array(termGroup),
    leadership: z.array(termGroup),
    methodologies: z.array(termGroup),
    industry: z.array(termGroup),
  }),
});

interface CompiledGroup {
  category: SkillCategory;
  terms: string[];
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-term matcher. Lookarounds instead of \b so "C++" and "Node.js" work.
 */
function termPattern(terms: string[], flags: string): RegExp {
  const alternatives = [...terms].sort((a, b) => b.length - a.length).map(escapeRegExp);
  return new RegExp(`(?<!\\w)(?:${alternatives.join('|')})(?!\\w)`, flags);
}

const patterns = skillPatternsSchema.parse(JSON.parse(readFileSync(PATTERNS_PATH, 'utf-8')));

const vocabulary = patterns.vocabulary.map((term) => ({ term, pattern: termPattern([term], 'i') }));

const groups: CompiledGroup[] = SKILL_CATEGORIES.flatMap((category) =>
  patterns.categories[category].map((terms) => ({ category, terms, pattern: termPattern(terms, 'gi') }))
);

/**
 * Fixed-vocabulary scan of description + requirements. Terms come back in vocabulary order.
 */
export function extractSkills(description: string | null | undefined, requirements?: string | null): string[] {
  const text = `${description ?? ''} ${requirements ?? ''}`.toLowerCase();
  if (!text.trim()) {
    return [];
  }
  return vocabulary.filter(({ pattern }) => pattern.test(text)).map(({ term }) => term);
}

function countMentions(text: string, skill: string): number {
  return text.match(termPattern([skill], 'gi'))?.length ?? 0;
}

/**
 * Category-pattern extraction ranked by how often each skill is mentioned
 */
export function extractCategorizedSkills(text: string | null | undefined, maxSkills = 25): string[] {
  if (!text) {
    return [];
  }

  const found = new Map<string, string>();
  for (const group of groups) {
    for (const match of text.matchAll(group.pattern)) {
      const matched = match[0];
      const key = matched.toLowerCase();
      if (!found.has(key)) {
        found.set(key, group.terms.find((term) => term.toLowerCase() === key) ?? matched);
      }
    }
  }

  return [...found.values()]
    .map((skill) => ({ skill, mentions: countMentions(text, skill) }))
    .sort((a, b) => b.mentions - a.mentions)
    .slice(0, maxSkills)
    .map(({ skill }) => skill);
}

/**
 * Skills grouped by category, for analysis insights
 */
export function categorizeSkills(skills: string[]): Partial<Record<SkillCategory, string[]>> {
  const result: Partial<Record<SkillCategory, string[]>> = {};
  for (const skill of skills) {
    const group = groups.find(({ terms }) => terms.some((term) => term.toLowerCase() === skill.toLowerCase()));
    if (group) {
      result[group.category] = [...(result[group.category] ?? []), skill];
    }
  }
  return result;
}
