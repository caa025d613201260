import { describe, it, expect, vi } from 'vitest';
import { SqlBuilder } from '../db/sql.js';
import { NotFoundError } from '../errors/application-errors.js';
import { PgAnalysisRepository, applyAnalysisFilters, mapAnalysisRow, percentage, type AnalysisRow } from './analysis.js';

function analysisRow(overrides: Partial<AnalysisRow> = {}): AnalysisRow {
  return {
    id: 7,
    job_id: 1,
    user_id: null,
    analysis_type: 'job_match',
    analysis_version: '1.0',
    ai_model_used: 'rule_based',
    results: { overall_score: 0.8 },
    confidence_score: 0.85,
    match_score: 0.8,
    skill_match_score: null,
    experience_match_score: null,
    location_match_score: null,
    salary_match_score: null,
    culture_match_score: null,
    key_insights: [],
    recommendations: [],
    red_flags: [],
    status: 'completed',
    error_message: null,
    processing_time_seconds: 0.2,
    created_at: new Date('2024-03-01T00:00:00Z'),
    updated_at: new Date('2024-03-01T00:00:00Z'),
    ...overrides,
  };
}

function createRepo() {
  const query = vi.fn();
  return { query, repo: new PgAnalysisRepository({ query }) };
}

describe('applyAnalysisFilters', () => {
  it('has no conditions without filters', () => {
    expect(applyAnalysisFilters(new SqlBuilder(), {}).whereClause()).toBe('');
  });

  it('filters by job, status and minimum score', () => {
    const builder = applyAnalysisFilters(new SqlBuilder(), { jobId: 3, status: 'completed', minMatchScore: 0.7 });

    expect(builder.whereClause()).toBe('WHERE job_id = $1 AND status = $2 AND match_score >= $3');
    expect(builder.params).toEqual([3, 'completed', 0.7]);
  });
});

describe('mapAnalysisRow', () => {
  it('keeps well-formed JSONB entries', () => {
    const analysis = mapAnalysisRow(
      analysisRow({
        key_insights: [{ category: 'skills', insight: 'Strong SQL', importance: 'high', timestamp: 't' }],
        red_flags: ['vague description'],
      })
    );

    expect(analysis.keyInsights).toEqual([{ category: 'skills', insight: 'Strong SQL', importance: 'high', timestamp: 't' }]);
    expect(analysis.redFlags).toEqual(['vague description']);
    expect(analysis.results).toEqual({ overall_score: 0.8 });
  });

  it('falls back to empty values for malformed JSONB', () => {
    const analysis = mapAnalysisRow(analysisRow({ results: 'oops', key_insights: 'nope', recommendations: null }));

    expect(analysis.results).toEqual({});
    expect(analysis.keyInsights).toEqual([]);
    expect(analysis.recommendations).toEqual([]);
  });
});

describe('PgAnalysisRepository', () => {
  it('looks up the latest completed analysis since a cutoff', async () => {
    const { query, repo } = createRepo();
    query.mockResolvedValueOnce({ rows: [analysisRow()], rowCount: 1 });
    const since = new Date('2024-02-29T00:00:00Z');

    const found = await repo.findLatestCompleted(1, 'job_match', since);

    expect(query.mock.calls[0]).toEqual([
      "SELECT * FROM analyses WHERE job_id = $1 AND analysis_type = $2 AND status = 'completed' AND created_at >= $3 ORDER BY created_at DESC LIMIT 1",
      [1, 'job_match', since],
    ]);
    expect(found?.id).toBe(7);
  });

  it('serializes JSONB columns on insert', async () => {
    const { query, repo } = createRepo();
    query.mockResolvedValueOnce({ rows: [analysisRow()], rowCount: 1 });

    await repo.create({
      jobId: 1,
      userId: null,
      analysisType: 'job_match',
      analysisVersion: '1.0',
      aiModelUsed: null,
      results: { overall_score: 0.8 },
      confidenceScore: null,
      matchScore: null,
      skillMatchScore: null,
      experienceMatchScore: null,
      locationMatchScore: null,
      salaryMatchScore: null,
      cultureMatchScore: null,
      keyInsights: [],
      recommendations: [],
      redFlags: ['no salary'],
      status: 'pending',
      errorMessage: null,
      processingTimeSeconds: null,
    });

    const values = query.mock.calls[0]?.[1];
    expect(values[5]).toBe('{"overall_score":0.8}');
    expect(values[15]).toBe('["no salary"]');
  });

  it('throws NotFoundError when saving a missing analysis', async () => {
    const { query, repo } = createRepo();
    query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repo.save(mapAnalysisRow(analysisRow({ id: 99 })))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('derives rates from the aggregate counts', async () => {
    const { query, repo } = createRepo();
    query.mockResolvedValueOnce({
      rows: [
        {
          total_analyses: 8,
          completed_analyses: 6,
          failed_analyses: 2,
          high_match_analyses: 2,
          recent_analyses: 5,
          average_match_score: 0.71234,
          average_confidence_score: null,
        },
      ],
      rowCount: 1,
    });
    query.mockResolvedValueOnce({ rows: [{ name: 'job_match', count: 8 }], rowCount: 1 });
    query.mockResolvedValueOnce({ rows: [{ name: 'rule_based', count: 6 }], rowCount: 1 });

    const stats = await repo.getStatistics();

    expect(stats.successRate).toBe(75);
    expect(stats.highMatchRate).toBe(33.3);
    expect(stats.averageMatchScore).toBe(0.712);
    expect(stats.averageConfidenceScore).toBeNull();
    expect(stats.analysisTypes).toEqual({ job_match: 8 });
    expect(stats.aiModelsUsed).toEqual({ rule_based: 6 });
  });
});

describe('percentage', () => {
  it('is 0 for an empty whole', () => {
    expect(percentage(3, 0)).toBe(0);
  });
});
