import { createHash } from 'crypto';
import { logger } from '../utils/logger.js';
import type { ScrapedJob } from '../core/types.js';
import type { IService } from '../core/interfaces.js';

const MIN_TITLE_LENGTH = 3;
const MIN_DESCRIPTION_LENGTH = 50;

const TITLE_KEYWORDS = [
  'manager',
  'analyst',
  'consultant',
  'director',
  'strategy',
  'product',
  'business',
  'operations',
  'marketing',
  'finance',
];
const BUSINESS_SKILLS = ['mba', 'strategy', 'analytics', 'leadership', 'project management'];
const WELL_KNOWN_EMPLOYERS = [
  'google',
  'microsoft',
  'amazon',
  'apple',
  'meta',
  'tesla',
  'mckinsey',
  'bcg',
  'bain',
  'deloitte',
  'pwc',
  'accenture',
  'goldman',
  'morgan',
  'jpmorgan',
  'blackstone',
  'kkr',
];

export function cleanText(text: string): string {
  return text
    .replace(/[\u200B-\u200D\uFEFF]/g, '') // Remove zero-width chars
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * In-memory duplicate detection on title|company|location
 */
export class JobDeduplicator {
  private readonly seen = new Set<string>();
  private processed = 0;

  static keyOf(job: Pick<ScrapedJob, 'title' | 'companyName' | 'location'>): string {
    const content = [job.title, job.companyName, job.location ?? '']
      .map((part) => part.toLowerCase().trim())
      .join('|');
    return createHash('sha256').update(content).digest('hex').substring(0, 16);
  }

  /**
   * True when an equivalent job was seen before. The first sighting is recorded.
   */
  isDuplicate(job: Pick<ScrapedJob, 'title' | 'companyName' | 'location'>): boolean {
    this.processed++;
    const key = JobDeduplicator.keyOf(job);
    if (this.seen.has(key)) {
      return true;
    }
    this.seen.add(key);
    return false;
  }

  getStats(): { uniqueJobs: number; totalProcessed: number; duplicates: number } {
    return {
      uniqueJobs: this.seen.size,
      totalProcessed: this.processed,
      duplicates: this.processed - this.seen.size,
    };
  }

  reset(): void {
    this.seen.clear();
    this.processed = 0;
  }
}

export type ValidationResult = { valid: true } | { valid: false; reason: string };

export function validateJobData(job: Pick<ScrapedJob, 'title' | 'companyName' | 'description'>): ValidationResult {
  if (!job.title.trim()) {
    return { valid: false, reason: 'missing title' };
  }
  if (!job.companyName.trim()) {
    return { valid: false, reason: 'missing company_name' };
  }
  if (job.title.trim().length < MIN_TITLE_LENGTH) {
    return { valid: false, reason: `title shorter than ${MIN_TITLE_LENGTH} characters` };
  }
  const descriptionLength = job.description?.trim().length ?? 0;
  if (descriptionLength < MIN_DESCRIPTION_LENGTH) {
    return { valid: false, reason: `description shorter than ${MIN_DESCRIPTION_LENGTH} characters (${descriptionLength})` };
  }
  return { valid: true };
}

/**
 * 0..1 relevance for business-track roles: title 0.4, skills 0.3, salary 0.2, employer 0.1
 */
export function calculateRelevanceScore(
  job: Pick<ScrapedJob, 'title' | 'companyName' | 'skills' | 'salaryMin'>
): number {
  const title = job.title.toLowerCase();
  const company = job.companyName.toLowerCase();

  const titleMatches = TITLE_KEYWORDS.filter((keyword) => title.includes(keyword)).length;
  let score = Math.min(titleMatches / 3, 1) * 0.4;

  const skillMatches = job.skills.filter((skill) =>
    BUSINESS_SKILLS.some((businessSkill) => skill.toLowerCase().includes(businessSkill))
  ).length;
  score += Math.min(skillMatches / 5, 1) * 0.3;

  if (job.salaryMin !== null && job.salaryMin >= 60000) {
    score += Math.min((job.salaryMin - 60000) / 140000, 1) * 0.2;
  }

  score += WELL_KNOWN_EMPLOYERS.some((name) => company.includes(name)) ? 0.1 : 0.05;

  return Math.round(Math.min(score, 1) * 1000) / 1000;
}

const HIGH_RELEVANCE = 0.7;

export interface NormalizeResult {
  jobs: ScrapedJob[];
  invalid: number;
  duplicates: number;
}

/**
 * NormalizerService - cleans text, drops invalid jobs and in-batch duplicates
 */
export class NormalizerService implements IService<ScrapedJob[], NormalizeResult> {
  async execute(jobs: ScrapedJob[]): Promise<NormalizeResult> {
    logger.info('Normalizer', `Processing ${jobs.length} jobs...`);

    const deduplicator = new JobDeduplicator();
    const unique: ScrapedJob[] = [];
    let invalid = 0;

    for (const raw of jobs) {
      const job = this.normalizeJob(raw);
      const validation = validateJobData(job);
      if (!validation.valid) {
        logger.debug('Normalizer', `Skipping "${job.title}": ${validation.reason}`);
        invalid++;
        continue;
      }
      if (deduplicator.isDuplicate(job)) {
        continue;
      }
      unique.push(job);
    }

    const { duplicates } = deduplicator.getStats();
    if (duplicates > 0) {
      logger.info('Normalizer', `Removed ${duplicates} duplicates`);
    }

    const relevant = unique.filter((job) => calculateRelevanceScore(job) >= HIGH_RELEVANCE).length;
    logger.info('Normalizer', `Returning ${unique.length} unique jobs (${invalid} invalid, ${relevant} highly relevant)`);
    return { jobs: unique, invalid, duplicates };
  }

  private normalizeJob(job: ScrapedJob): ScrapedJob {
    return {
      ...job,
      title: cleanText(job.title),
      companyName: cleanText(job.companyName),
      location: job.location ? cleanText(job.location) : null,
      description: job.description ? cleanText(job.description) : null,
      requirements: job.requirements ? cleanText(job.requirements) : null,
    };
  }
}
