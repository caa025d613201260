import cron from 'node-cron';
import { randomUUID } from 'crypto';
import type { IScheduledTask, TaskResult } from '../core/interfaces.js';
import { NotFoundError } from '../errors/application-errors.js';
import { recordTaskRun } from '../observability/metrics.js';
import { createTaskLogger, logger } from '../utils/logger.js';
import { addTaskBreadcrumb, captureError, withSentryScope } from '../utils/sentry.js';
import { createTasks, type TaskDependencies } from './tasks.js';

/**
 * Runs scheduled tasks. A task whose previous run is still in progress is skipped.
 */
export class TaskRunner {
  private readonly tasks = new Map<string, IScheduledTask>();
  private readonly running = new Set<string>();
  private scheduled: cron.ScheduledTask[] = [];

  constructor(
    tasks: IScheduledTask[],
    private readonly now: () => Date = () => new Date()
  ) {
    for (const task of tasks) {
      this.tasks.set(task.name, task);
    }
  }

  get taskNames(): string[] {
    return [...this.tasks.keys()];
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  /**
   * Run one task now. Failures are reported in the result, never thrown.
   */
  async run(name: string): Promise<TaskResult> {
    const task = this.tasks.get(name);
    if (!task) {
      throw new NotFoundError('Task', name);
    }

    if (this.running.has(name)) {
      logger.debug('Scheduler', `${name} still running, skipping`);
      recordTaskRun(name, 'skipped');
      addTaskBreadcrumb(name, 'skip');
      return { status: 'skipped', reason: 'previous run still in progress', timestamp: this.now().toISOString() };
    }

    const log = createTaskLogger(name, randomUUID());
    this.running.add(name);
    addTaskBreadcrumb(name, 'start');
    const startedAt = Date.now();

    try {
      const result = await withSentryScope({ task: name }, () => task.run(log));
      const seconds = ((Date.now() - startedAt) / 1000).toFixed(1);
      log.info(`Completed in ${seconds}s`);
      recordTaskRun(name, result.status);
      addTaskBreadcrumb(name, 'complete', { status: result.status });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Failed', error);
      recordTaskRun(name, 'failed');
      addTaskBreadcrumb(name, 'fail', { error: message });
      captureError(error, { task: name });
      return { status: 'failed', error: message, timestamp: this.now().toISOString() };
    } finally {
      this.running.delete(name);
    }
  }

  start(): void {
    if (this.scheduled.length > 0) {
      logger.warn('Scheduler', 'Scheduler already started');
      return;
    }
    for (const task of this.tasks.values()) {
      if (!cron.validate(task.schedule)) {
        throw new Error(`Invalid cron expression for ${task.name}: ${task.schedule}`);
      }
      this.scheduled.push(
        cron.schedule(task.schedule, () => {
          this.run(task.name).catch((error: unknown) => logger.error('Scheduler', `${task.name} crashed`, error));
        })
      );
    }
    logger.info('Scheduler', `Started ${this.scheduled.length} tasks: ${this.taskNames.join(', ')}`);
  }

  stop(): void {
    for (const task of this.scheduled) {
      task.stop();
    }
    this.scheduled = [];
    logger.info('Scheduler', 'Stopped');
  }
}

let runner: TaskRunner | null = null;

export function initScheduler(deps: TaskDependencies): TaskRunner {
  if (runner) {
    logger.warn('Scheduler', 'Scheduler already initialized');
    return runner;
  }
  runner = new TaskRunner(createTasks(deps));
  runner.start();
  return runner;
}

export function stopScheduler(): void {
  if (runner) {
    runner.stop();
    runner = null;
  }
}

/**
 * Manual trigger of a scheduled task
 */
export async function runTaskNow(name: string): Promise<TaskResult> {
  if (!runner) {
    throw new Error('Scheduler is not initialized');
  }
  logger.info('Scheduler', `Manual trigger: ${name}`);
  return runner.run(name);
}
