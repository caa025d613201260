import pLimit from 'p-limit';
import type {
  Analysis,
  AnalysisCreateInput,
  AnalysisSearchFilters,
  AnalysisStatistics,
  Job,
  JobMatchResult,
  Page,
  PaginationParams,
  UserProfile,
} from '../core/types.js';
import { NotFoundError } from '../errors/application-errors.js';
import { recoveryHandler, type UserFriendlyErrorHandler } from '../errors/recovery.js';
import { JobAnalyzerAgent } from '../agents/analyzer.js';
import { isLLMConfigured } from '../llm/client.js';
import { addInsight, addRecommendation, markAsCompleted, markAsFailed, updateScores } from '../models/analysis.js';
import { hasSalaryInfo, isExpiredJob } from '../models/job.js';
import type { AnalysisRepository } from '../repositories/analysis.js';
import type { JobRepository } from '../repositories/job.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_USER_PROFILE, JobMatcherService } from './job-matcher.js';

const REUSE_WINDOW_MS = 24 * 60 * 60 * 1000;
const RULE_BASED_MODEL = 'rule_based';

export type Analyzer = Pick<JobAnalyzerAgent, 'model' | 'execute' | 'verify'>;
export type RecoveryHandler = Pick<UserFriendlyErrorHandler, 'handleError'>;

export interface AnalyzeOptions {
  userId?: string;
  profile?: UserProfile;
  forceRefresh?: boolean;
}

export interface AnalyzeResult {
  analysis: Analysis;
  reused: boolean;
}

export interface BatchAnalysisResult {
  candidates: number;
  analyzed: number;
  failed: number;
}

export function redFlagsFor(job: Job, now = new Date()): string[] {
  const flags: string[] = [];
  if (!hasSalaryInfo(job)) flags.push('No salary information provided');
  if (isExpiredJob(job, now)) flags.push('Job posting has expired');
  if (!job.description) flags.push('Missing job description');
  return flags;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * AnalysisService - job match analyses: rule-based scores, optional AI summary
 */
export class AnalysisService {
  constructor(
    private readonly jobs: JobRepository,
    private readonly analyses: AnalysisRepository,
    private readonly matcher = new JobMatcherService(),
    private readonly analyzer: Analyzer | null = isLLMConfigured() ? new JobAnalyzerAgent() : null,
    private readonly recovery: RecoveryHandler = recoveryHandler,
    private readonly now: () => Date = () => new Date()
  ) {}

  async analyzeJob(jobId: number, options: AnalyzeOptions = {}): Promise<AnalyzeResult> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }

    if (!options.forceRefresh) {
      const since = new Date(this.now().getTime() - REUSE_WINDOW_MS);
      const existing = await this.analyses.findLatestCompleted(jobId, 'job_match', since, options.userId);
      if (existing) {
        logger.debug('Analysis', `Reusing analysis ${existing.id} for job ${jobId}`);
        return { analysis: existing, reused: true };
      }
    }

    return { analysis: await this.runAnalysis(job, options), reused: false };
  }

  async createAnalysis(input: AnalysisCreateInput): Promise<Analysis> {
    const job = await this.jobs.findById(input.jobId);
    if (!job) {
      throw new NotFoundError('Job', input.jobId);
    }
    return this.analyses.create(input);
  }

  async getById(id: number): Promise<Analysis> {
    const analysis = await this.analyses.findById(id);
    if (!analysis) {
      throw new NotFoundError('Analysis', id);
    }
    return analysis;
  }

  search(filters: AnalysisSearchFilters, pagination: PaginationParams): Promise<Page<Analysis>> {
    return this.analyses.search(filters, pagination);
  }

  getStatistics(): Promise<AnalysisStatistics> {
    return this.analyses.getStatistics(this.now());
  }

  /**
   * Rule-based analysis for active jobs that have none yet
   */
  async analyzeUnanalyzed(limit = 50, concurrency = 5): Promise<BatchAnalysisResult> {
    const candidates = await this.jobs.findWithoutAnalysis(limit);
    const limiter = pLimit(concurrency);

    const results = await Promise.allSettled(candidates.map((job) => limiter(() => this.runAnalysis(job, {}))));

    let failed = 0;
    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        failed++;
        logger.warn('Analysis', `Analysis of job ${candidates[index]?.id} failed`, errorMessage(result.reason));
      }
    }
    return { candidates: candidates.length, analyzed: candidates.length - failed, failed };
  }

  private async runAnalysis(job: Job, options: AnalyzeOptions): Promise<Analysis> {
    const started = Date.now();
    const profile = options.profile ?? DEFAULT_USER_PROFILE;

    let analysis = await this.analyses.create({
      jobId: job.id,
      userId: options.userId ?? null,
      analysisType: 'job_match',
      analysisVersion: '1.0',
      aiModelUsed: RULE_BASED_MODEL,
      results: {},
      confidenceScore: null,
      matchScore: null,
      skillMatchScore: null,
      experienceMatchScore: null,
      locationMatchScore: null,
      salaryMatchScore: null,
      cultureMatchScore: null,
      keyInsights: [],
      recommendations: [],
      redFlags: [],
      status: 'processing',
      errorMessage: null,
      processingTimeSeconds: null,
    });

    try {
      const match = this.matcher.match(job, profile);
      analysis = this.applyMatch(analysis, match);
      analysis = { ...analysis, redFlags: redFlagsFor(job, this.now()) };

      if (this.analyzer) {
        analysis = await this.enrichWithAI(this.analyzer, analysis, job, profile, match);
      }

      const seconds = Math.round((Date.now() - started) / 10) / 100;
      const saved = await this.analyses.save(markAsCompleted(analysis, seconds));
      logger.info('Analysis', `Job ${job.id} scored ${match.overall_score} (${match.application_priority})`);
      return saved;
    } catch (error) {
      logger.error('Analysis', `Analysis ${analysis.id} failed`, error);
      await this.analyses.save(markAsFailed(analysis, errorMessage(error)));
      throw error;
    }
  }

  private applyMatch(analysis: Analysis, match: JobMatchResult): Analysis {
    let next = updateScores(analysis, {
      matchScore: match.overall_score,
      confidenceScore: match.confidence_score,
      skillMatchScore: match.skill_match_score,
      experienceMatchScore: match.experience_match_score,
      locationMatchScore: match.location_match_score,
      salaryMatchScore: match.salary_match_score,
      cultureMatchScore: match.culture_match_score,
    });
    next = { ...next, results: { ...match } };

    for (const strength of match.insights.strengths) next = addInsight(next, 'strength', strength, 'high');
    for (const concern of match.insights.concerns) next = addInsight(next, 'concern', concern, 'medium');
    for (const opportunity of match.insights.opportunities) next = addInsight(next, 'opportunity', opportunity, 'low');
    for (const rec of match.recommendations) next = addRecommendation(next, rec.text, rec.type, rec.priority);
    return next;
  }

  /**
   * LLM failures fall back to the rule-based result through the recovery handler
   */
  private async enrichWithAI(
    analyzer: Analyzer,
    analysis: Analysis,
    job: Job,
    profile: UserProfile,
    match: JobMatchResult
  ): Promise<Analysis> {
    try {
      const output = await analyzer.execute({ job, profile, match });
      const verified = await analyzer.verify(output, match);

      await this.jobs.update(job.id, { aiFitScore: output.fitScore, aiSummary: output.summary });

      const enriched: Analysis = {
        ...analysis,
        aiModelUsed: analyzer.model,
        results: {
          ...analysis.results,
          ai_analysis: {
            fit_score: output.fitScore,
            summary: output.summary,
            strengths: output.strengths,
            concerns: output.concerns,
            verified: verified.verified,
            warnings: verified.warnings,
          },
        },
        redFlags: [...analysis.redFlags, ...output.redFlags],
      };
      return addInsight(enriched, 'ai_summary', output.summary, 'high');
    } catch (error) {
      const message = errorMessage(error);
      const errorType = /timed out|timeout/i.test(message) ? 'ai_analysis_timeout' : 'openai_quota_exceeded';
      const recovery = await this.recovery.handleError(errorType, error, { additionalData: { jobId: job.id } });
      logger.warn('Analysis', `AI analysis skipped for job ${job.id}: ${recovery.next_action}`);
      return addInsight(analysis, 'system', recovery.user_message, 'low');
    }
  }
}
