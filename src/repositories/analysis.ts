import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { Queryable } from '../db/client.js';
import { SqlBuilder, buildOrderBy, type SortSpec } from '../db/sql.js';
import { buildPage } from '../schemas/common.js';
import {
  ANALYSIS_STATUSES,
  ANALYSIS_TYPES,
  type Analysis,
  type AnalysisCreateInput,
  type AnalysisSearchFilters,
  type AnalysisStatistics,
  type AnalysisType,
  type Page,
  type PaginationParams,
} from '../core/types.js';
import { NotFoundError } from '../errors/application-errors.js';
import { isRecord, oneOf, toNumberOrNull, translateDbError } from './row-utils.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const priority = z.enum(['high', 'medium', 'low']).catch('medium');

// JSONB columns are parsed leniently: malformed entries are dropped
const insightsColumn = z
  .array(
    z.object({
      category: z.string(),
      insight: z.string(),
      importance: priority,
      timestamp: z.string().catch(''),
    })
  )
  .catch([]);

const recommendationsColumn = z
  .array(
    z.object({
      recommendation: z.string(),
      action_type: z.string(),
      priority,
      timestamp: z.string().catch(''),
    })
  )
  .catch([]);

const redFlagsColumn = z.array(z.string()).catch([]);

export interface AnalysisRow extends QueryResultRow {
  id: number;
  job_id: number;
  user_id: string | null;
  analysis_type: string;
  analysis_version: string;
  ai_model_used: string | null;
  results: unknown;
  confidence_score: number | null;
  match_score: number | null;
  skill_match_score: number | null;
  experience_match_score: number | null;
  location_match_score: number | null;
  salary_match_score: number | null;
  culture_match_score: number | null;
  key_insights: unknown;
  recommendations: unknown;
  red_flags: unknown;
  status: string;
  error_message: string | null;
  processing_time_seconds: number | null;
  created_at: Date;
  updated_at: Date;
}

export function mapAnalysisRow(row: AnalysisRow): Analysis {
  return {
    id: row.id,
    jobId: row.job_id,
    userId: row.user_id,
    analysisType: oneOf(ANALYSIS_TYPES, row.analysis_type) ?? 'job_match',
    analysisVersion: row.analysis_version,
    aiModelUsed: row.ai_model_used,
    results: isRecord(row.results) ? row.results : {},
    confidenceScore: toNumberOrNull(row.confidence_score),
    matchScore: toNumberOrNull(row.match_score),
    skillMatchScore: toNumberOrNull(row.skill_match_score),
    experienceMatchScore: toNumberOrNull(row.experience_match_score),
    locationMatchScore: toNumberOrNull(row.location_match_score),
    salaryMatchScore: toNumberOrNull(row.salary_match_score),
    cultureMatchScore: toNumberOrNull(row.culture_match_score),
    keyInsights: insightsColumn.parse(row.key_insights),
    recommendations: recommendationsColumn.parse(row.recommendations),
    redFlags: redFlagsColumn.parse(row.red_flags),
    status: oneOf(ANALYSIS_STATUSES, row.status) ?? 'pending',
    errorMessage: row.error_message,
    processingTimeSeconds: toNumberOrNull(row.processing_time_seconds),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export const ANALYSIS_SORT: SortSpec = {
  columns: {
    created_at: 'created_at',
    updated_at: 'updated_at',
    match_score: 'match_score',
    confidence_score: 'confidence_score',
    status: 'status',
  },
  defaultOrderBy: 'created_at DESC, id DESC',
  tiebreaker: 'id',
};

// JSONB values are sent as JSON text
function columnValues(input: AnalysisCreateInput): Array<[string, unknown]> {
  return [
    ['job_id', input.jobId],
    ['user_id', input.userId],
    ['analysis_type', input.analysisType],
    ['analysis_version', input.analysisVersion],
    ['ai_model_used', input.aiModelUsed],
    ['results', JSON.stringify(input.results)],
    ['confidence_score', input.confidenceScore],
    ['match_score', input.matchScore],
    ['skill_match_score', input.skillMatchScore],
    ['experience_match_score', input.experienceMatchScore],
    ['location_match_score', input.locationMatchScore],
    ['salary_match_score', input.salaryMatchScore],
    ['culture_match_score', input.cultureMatchScore],
    ['key_insights', JSON.stringify(input.keyInsights)],
    ['recommendations', JSON.stringify(input.recommendations)],
    ['red_flags', JSON.stringify(input.redFlags)],
    ['status', input.status],
    ['error_message', input.errorMessage],
    ['processing_time_seconds', input.processingTimeSeconds],
  ];
}

export function applyAnalysisFilters(builder: SqlBuilder, filters: AnalysisSearchFilters): SqlBuilder {
  if (filters.jobId !== undefined) {
    builder.where(`job_id = ${builder.param(filters.jobId)}`);
  }
  if (filters.userId !== undefined) {
    builder.where(`user_id = ${builder.param(filters.userId)}`);
  }
  if (filters.analysisType !== undefined) {
    builder.where(`analysis_type = ${builder.param(filters.analysisType)}`);
  }
  if (filters.status !== undefined) {
    builder.where(`status = ${builder.param(filters.status)}`);
  }
  if (filters.minMatchScore !== undefined) {
    builder.where(`match_score >= ${builder.param(filters.minMatchScore)}`);
  }
  return builder;
}

export interface AnalysisRepository {
  create(input: AnalysisCreateInput): Promise<Analysis>;
  findById(id: number): Promise<Analysis | null>;
  search(filters: AnalysisSearchFilters, pagination: PaginationParams): Promise<Page<Analysis>>;
  findLatestCompleted(jobId: number, analysisType: AnalysisType, since: Date, userId?: string): Promise<Analysis | null>;
  save(analysis: Analysis): Promise<Analysis>;
  deleteFailedOlderThan(cutoff: Date): Promise<number>;
  countCreatedSince(since: Date): Promise<number>;
  getStatistics(now?: Date): Promise<AnalysisStatistics>;
}

export class PgAnalysisRepository implements AnalysisRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: AnalysisCreateInput): Promise<Analysis> {
    const builder = new SqlBuilder();
    const pairs = columnValues(input);
    const placeholders = pairs.map(([, value]) => builder.param(value));

    try {
      const result = await this.db.query<AnalysisRow>(
        `INSERT INTO analyses (${pairs.map(([column]) => column).join(', ')})
         VALUES (${placeholders.join(', ')}) RETURNING *`,
        builder.params
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('INSERT returned no row');
      }
      return mapAnalysisRow(row);
    } catch (error) {
      throw translateDbError(error, 'analyses.create');
    }
  }

  async findById(id: number): Promise<Analysis | null> {
    const result = await this.db.query<AnalysisRow>('SELECT * FROM analyses WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapAnalysisRow(row) : null;
  }

  async search(filters: AnalysisSearchFilters, pagination: PaginationParams): Promise<Page<Analysis>> {
    const builder = applyAnalysisFilters(new SqlBuilder(), filters);
    const where = builder.whereClause();
    const orderBy = buildOrderBy(pagination, ANALYSIS_SORT);

    const countResult = await this.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM analyses ${where}`,
      [...builder.params]
    );
    const total = countResult.rows[0]?.count ?? 0;

    const limitOffset = builder.limitOffset(pagination);
    const result = await this.db.query<AnalysisRow>(
      `SELECT * FROM analyses ${where} ${orderBy} ${limitOffset}`,
      builder.params
    );
    return buildPage(result.rows.map(mapAnalysisRow), total, pagination);
  }

  async findLatestCompleted(
    jobId: number,
    analysisType: AnalysisType,
    since: Date,
    userId?: string
  ): Promise<Analysis | null> {
    const builder = new SqlBuilder();
    builder
      .where(`job_id = ${builder.param(jobId)}`)
      .where(`analysis_type = ${builder.param(analysisType)}`)
      .where(`status = 'completed'`)
      .where(`created_at >= ${builder.param(since)}`);
    if (userId !== undefined) {
      builder.where(`user_id = ${builder.param(userId)}`);
    }

    const result = await this.db.query<AnalysisRow>(
      `SELECT * FROM analyses ${builder.whereClause()} ORDER BY created_at DESC LIMIT 1`,
      builder.params
    );
    const row = result.rows[0];
    return row ? mapAnalysisRow(row) : null;
  }

  async save(analysis: Analysis): Promise<Analysis> {
    const builder = new SqlBuilder();
    const sets = columnValues(analysis).map(([column, value]) => `${column} = ${builder.param(value)}`);
    sets.push('updated_at = NOW()');

    const result = await this.db.query<AnalysisRow>(
      `UPDATE analyses SET ${sets.join(', ')} WHERE id = ${builder.param(analysis.id)} RETURNING *`,
      builder.params
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Analysis', analysis.id);
    }
    return mapAnalysisRow(row);
  }

  async deleteFailedOlderThan(cutoff: Date): Promise<number> {
    const result = await this.db.query("DELETE FROM analyses WHERE status = 'failed' AND created_at < $1", [cutoff]);
    return result.rowCount ?? 0;
  }

  async countCreatedSince(since: Date): Promise<number> {
    const result = await this.db.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM analyses WHERE created_at >= $1',
      [since]
    );
    return result.rows[0]?.count ?? 0;
  }

  async getStatistics(now = new Date()): Promise<AnalysisStatistics> {
    const weekAgo = new Date(now.getTime() - 7 * DAY_MS);

    const totals = await this.db.query<{
      total_analyses: number;
      completed_analyses: number;
      failed_analyses: number;
      high_match_analyses: number;
      recent_analyses: number;
      average_match_score: number | null;
      average_confidence_score: number | null;
    }>(
      `SELECT
         COUNT(*)::int AS total_analyses,
         COUNT(*) FILTER (WHERE status = 'completed')::int AS completed_analyses,
         COUNT(*) FILTER (WHERE status = 'failed')::int AS failed_analyses,
         COUNT(*) FILTER (WHERE status = 'completed' AND match_score >= 0.8)::int AS high_match_analyses,
         COUNT(*) FILTER (WHERE created_at >= $1)::int AS recent_analyses,
         AVG(match_score) FILTER (WHERE status = 'completed')::float8 AS average_match_score,
         AVG(confidence_score) FILTER (WHERE status = 'completed')::float8 AS average_confidence_score
       FROM analyses`,
      [weekAgo]
    );
    const types = await this.db.query<{ name: string; count: number }>(
      'SELECT analysis_type AS name, COUNT(*)::int AS count FROM analyses GROUP BY analysis_type'
    );
    const models = await this.db.query<{ name: string; count: number }>(
      `SELECT ai_model_used AS name, COUNT(*)::int AS count FROM analyses
       WHERE ai_model_used IS NOT NULL GROUP BY ai_model_used`
    );

    const row = totals.rows[0];
    const total = row?.total_analyses ?? 0;
    const completed = row?.completed_analyses ?? 0;
    const highMatch = row?.high_match_analyses ?? 0;
    const averageMatch = toNumberOrNull(row?.average_match_score);
    const averageConfidence = toNumberOrNull(row?.average_confidence_score);

    return {
      totalAnalyses: total,
      completedAnalyses: completed,
      failedAnalyses: row?.failed_analyses ?? 0,
      highMatchAnalyses: highMatch,
      recentAnalyses: row?.recent_analyses ?? 0,
      successRate: percentage(completed, total),
      highMatchRate: percentage(highMatch, completed),
      averageMatchScore: averageMatch === null ? null : round(averageMatch, 3),
      averageConfidenceScore: averageConfidence === null ? null : round(averageConfidence, 3),
      analysisTypes: Object.fromEntries(types.rows.map((r) => [r.name, r.count])),
      aiModelsUsed: Object.fromEntries(models.rows.map((r) => [r.name, r.count])),
    };
  }
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * part / whole as a percentage with one decimal. 0 when whole is 0.
 */
export function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : round((part / whole) * 100, 1);
}
