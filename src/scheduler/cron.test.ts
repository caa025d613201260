import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IScheduledTask, TaskResult } from '../core/interfaces.js';
import { NotFoundError } from '../errors/application-errors.js';
import { getCounterValue, resetMetrics } from '../observability/metrics.js';
import { fakeAnalysisRepository, fakeJobRepository } from '../testing/fixtures.js';
import { TaskRunner, initScheduler, runTaskNow, stopScheduler } from './cron.js';

const NOW = new Date('2024-03-10T12:00:00Z');

function task(name: string, run: IScheduledTask['run']): IScheduledTask {
  return { name, schedule: '* * * * *', run };
}

beforeEach(() => {
  resetMetrics();
});

describe('TaskRunner', () => {
  it('returns the task result and counts the run', async () => {
    const runner = new TaskRunner([task('refresh_cache', async () => ({ status: 'completed', timestamp: 't' }))], () => NOW);

    await expect(runner.run('refresh_cache')).resolves.toEqual({ status: 'completed', timestamp: 't' });
    expect(getCounterValue('scheduler_task_runs_total', { task: 'refresh_cache', status: 'completed' })).toBe(1);
    expect(runner.isRunning('refresh_cache')).toBe(false);
  });

  it('skips a task whose previous run is still in progress', async () => {
    let finish: (result: TaskResult) => void = () => {};
    const slow = task(
      'scrape_jobs',
      () =>
        new Promise<TaskResult>((resolve) => {
          finish = resolve;
        })
    );
    const runner = new TaskRunner([slow], () => NOW);

    const first = runner.run('scrape_jobs');
    const second = await runner.run('scrape_jobs');

    expect(second).toEqual({
      status: 'skipped',
      reason: 'previous run still in progress',
      timestamp: '2024-03-10T12:00:00.000Z',
    });
    finish({ status: 'completed', timestamp: 'done' });
    await expect(first).resolves.toEqual({ status: 'completed', timestamp: 'done' });
    expect(getCounterValue('scheduler_task_runs_total', { task: 'scrape_jobs', status: 'skipped' })).toBe(1);
  });

  it('reports failures instead of throwing', async () => {
    const runner = new TaskRunner(
      [
        task('daily_report', async () => {
          throw new Error('database unavailable');
        }),
      ],
      () => NOW
    );

    await expect(runner.run('daily_report')).resolves.toEqual({
      status: 'failed',
      error: 'database unavailable',
      timestamp: '2024-03-10T12:00:00.000Z',
    });
    expect(getCounterValue('scheduler_task_runs_total', { task: 'daily_report', status: 'failed' })).toBe(1);
    expect(runner.isRunning('daily_report')).toBe(false);
  });

  it('rejects unknown task names', async () => {
    const runner = new TaskRunner([]);

    await expect(runner.run('nope')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('runTaskNow', () => {
  it('requires an initialized scheduler', async () => {
    await expect(runTaskNow('refresh_cache')).rejects.toThrow('Scheduler is not initialized');
  });

  it('runs a task of the started scheduler', async () => {
    const invalidate = vi.fn().mockResolvedValue(1);
    const runner = initScheduler({
      jobs: fakeJobRepository(),
      analyses: fakeAnalysisRepository(),
      analysis: { analyzeUnanalyzed: vi.fn() },
      companies: { refreshJobCounts: vi.fn() },
      scrapers: { scrapeAll: vi.fn() },
      ingestion: { execute: vi.fn() },
      probes: { database: vi.fn(), redis: vi.fn(), apiKeys: () => ({}) },
      invalidate,
    });

    try {
      expect(runner.taskNames).toHaveLength(7);
      await expect(runTaskNow('refresh_cache')).resolves.toMatchObject({ status: 'completed', invalidated_keys: 2 });
      expect(invalidate.mock.calls).toEqual([['jobs'], ['companies']]);
    } finally {
      stopScheduler();
    }
  });
});
