/**
 * Core interfaces shared by services, agents and scheduled tasks
 */

import type { TaskLogger } from '../utils/logger.js';

/**
 * Deterministic service (no LLM)
 */
export interface IService<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}

/**
 * LLM-backed agent - output is checked against the source data before use
 */
export interface IAgent<TInput, TOutput> extends IService<TInput, TOutput> {
  verify?(output: TOutput, source: unknown): Promise<VerifiedOutput<TOutput>>;
}

/**
 * Wrapper for verified LLM outputs
 */
export interface VerifiedOutput<T> {
  data: T;
  verified: boolean;
  warnings: string[];
}

export type TaskStatus = 'completed' | 'failed' | 'skipped';

export interface TaskResult {
  status: TaskStatus;
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Unit of periodic work registered with the scheduler
 */
export interface IScheduledTask {
  readonly name: string;
  readonly schedule: string;
  run(log: TaskLogger): Promise<TaskResult>;
}
