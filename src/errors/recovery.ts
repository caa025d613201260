import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { addBreadcrumb } from '../utils/sentry.js';

export type Locale = 'en' | 'zh-TW';

export const RECOVERABLE_ERROR_TYPES = [
  'linkedin_rate_limit',
  'notion_api_error',
  'openai_quota_exceeded',
  'indeed_scraping_blocked',
  'database_connection_lost',
  'ai_analysis_timeout',
] as const;

export type RecoverableErrorType = (typeof RECOVERABLE_ERROR_TYPES)[number];

type InternalAction = 'log_warning' | 'schedule_retry' | 'alert_support_team' | 'log_incident';

interface ErrorMapping {
  userMessage: Record<Locale, string>;
  recoveryAction: string;
  businessImpact: string;
  internalAction: InternalAction;
  estimatedRecoverySeconds: number;
  alternatives: string[];
}

const ERROR_MAPPINGS: Record<RecoverableErrorType, ErrorMapping> = {
  linkedin_rate_limit: {
    userMessage: {
      'zh-TW': 'LinkedIn搜索暫時受限，已自動切換到Indeed獲取更多職缺',
      en: 'LinkedIn search is temporarily limited. Switched to Indeed to find more jobs.',
    },
    recoveryAction: 'switch_to_indeed_scraper',
    businessImpact: 'maintain_user_experience',
    internalAction: 'log_warning',
    estimatedRecoverySeconds: 30,
    alternatives: ['indeed', 'cached_results'],
  },
  notion_api_error: {
    userMessage: {
      'zh-TW': 'Notion同步暫時無法使用，數據已保存將稍後重試',
      en: 'Notion sync is temporarily unavailable. Your data is saved and will be retried later.',
    },
    recoveryAction: 'add_to_retry_queue',
    businessImpact: 'user_retention_risk',
    internalAction: 'schedule_retry',
    estimatedRecoverySeconds: 300,
    alternatives: ['export_csv'],
  },
  openai_quota_exceeded: {
    userMessage: {
      'zh-TW': 'AI分析服務暫時繁忙，為您提供基礎匹配結果',
      en: 'AI analysis is busy right now. Showing basic matching results instead.',
    },
    recoveryAction: 'use_basic_matching_algorithm',
    businessImpact: 'reduced_value_delivery',
    internalAction: 'alert_support_team',
    estimatedRecoverySeconds: 0,
    alternatives: ['rule_based_matching'],
  },
  indeed_scraping_blocked: {
    userMessage: {
      'zh-TW': 'Indeed職缺搜索暫時受阻，正在顯示最近的搜索結果',
      en: 'Indeed search is temporarily blocked. Showing the most recent results.',
    },
    recoveryAction: 'use_cached_results',
    businessImpact: 'data_freshness_reduced',
    internalAction: 'log_incident',
    estimatedRecoverySeconds: 3600,
    alternatives: ['linkedin', 'cached_results'],
  },
  database_connection_lost: {
    userMessage: {
      'zh-TW': '資料庫連線暫時中斷，正在使用快取資料',
      en: 'The database connection was interrupted. Serving cached data for now.',
    },
    recoveryAction: 'serve_from_cache',
    businessImpact: 'service_degradation',
    internalAction: 'alert_support_team',
    estimatedRecoverySeconds: 60,
    alternatives: ['cached_results'],
  },
  ai_analysis_timeout: {
    userMessage: {
      'zh-TW': 'AI分析時間較長，已轉為背景處理',
      en: 'AI analysis is taking longer than expected and will continue in the background.',
    },
    recoveryAction: 'queue_for_background_analysis',
    businessImpact: 'delayed_value_delivery',
    internalAction: 'schedule_retry',
    estimatedRecoverySeconds: 300,
    alternatives: ['rule_based_matching'],
  },
};

const UNKNOWN_ERROR_MESSAGE: Record<Locale, string> = {
  'zh-TW': '系統發生未預期的錯誤，請稍後再試',
  en: 'An unexpected error occurred. Please try again later.',
};

export interface ErrorContext {
  userId?: string;
  requestId?: string;
  endpoint?: string;
  method?: string;
  additionalData?: Record<string, unknown>;
  timestamp: Date;
}

export interface RecoveryResult {
  user_message: string;
  recovery_attempted: boolean;
  recovery_successful: boolean;
  business_impact: string;
  next_action: string;
  estimated_recovery_time: string | null;
  alternatives: string[];
  error?: string;
}

export interface RecoveryMetrics {
  recovery_metrics: Record<string, number>;
  error_statistics: {
    total_errors: number;
    error_counts: Record<string, number>;
  };
  user_experience_score: number;
}

/**
 * Callback run when a recoverable error occurs. Throwing marks the recovery as failed.
 */
export type RecoveryAction = (error: unknown, context: ErrorContext) => Promise<void>;

export function isRecoverableErrorType(value: string): value is RecoverableErrorType {
  return (RECOVERABLE_ERROR_TYPES as readonly string[]).includes(value);
}

/**
 * Render a duration in the given locale: "30秒", "10分鐘", "即時" / "30 seconds", "immediate"
 */
export function formatRecoveryTime(seconds: number, locale: Locale): string {
  const plural = (count: number, unit: string) => `${count} ${unit}${count === 1 ? '' : 's'}`;

  if (seconds <= 0) {
    return locale === 'zh-TW' ? '即時' : 'immediate';
  }
  if (seconds < 60) {
    return locale === 'zh-TW' ? `${seconds}秒` : plural(seconds, 'second');
  }
  if (seconds < 3600) {
    const minutes = Math.round(seconds / 60);
    return locale === 'zh-TW' ? `${minutes}分鐘` : plural(minutes, 'minute');
  }
  const hours = Math.round(seconds / 3600);
  return locale === 'zh-TW' ? `${hours}小時` : plural(hours, 'hour');
}

/**
 * Guess the recoverable category of a raw error from its message
 */
export function classifyError(error: unknown): RecoverableErrorType | null {
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();

  if (message.includes('linkedin')) return 'linkedin_rate_limit';
  if (message.includes('notion')) return 'notion_api_error';
  if (message.includes('openai') || message.includes('quota') || message.includes('rate limit')) {
    return 'openai_quota_exceeded';
  }
  if (message.includes('indeed')) return 'indeed_scraping_blocked';
  if (message.includes('database') || message.includes('connection')) return 'database_connection_lost';
  if (message.includes('timeout') || message.includes('timed out')) return 'ai_analysis_timeout';
  return null;
}

/**
 * Maps known failure categories to a localized user message, a recovery action
 * and a business-impact tag, and keeps counters for reporting.
 */
export class UserFriendlyErrorHandler {
  readonly errorCounts: Record<string, number> = {};
  readonly recoveryMetrics: Record<string, number> = { user_satisfaction_maintained: 0 };
  private readonly actions = new Map<string, RecoveryAction>();

  constructor(private readonly locale: Locale = 'en') {}

  /**
   * Register the callback executed for a recovery action name
   */
  registerRecoveryAction(name: string, action: RecoveryAction): void {
    this.actions.set(name, action);
  }

  async handleError(
    errorType: string,
    error: unknown,
    context: Partial<ErrorContext> = {}
  ): Promise<RecoveryResult> {
    const fullContext: ErrorContext = { ...context, timestamp: context.timestamp ?? new Date() };
    const message = error instanceof Error ? error.message : String(error);

    logger.info('Recovery', `Handling recoverable error: ${errorType}`, {
      error: message,
      endpoint: fullContext.endpoint,
      requestId: fullContext.requestId,
    });

    this.errorCounts[errorType] = (this.errorCounts[errorType] ?? 0) + 1;

    if (!isRecoverableErrorType(errorType)) {
      this.trackBusinessImpact('unknown');
      return {
        user_message: UNKNOWN_ERROR_MESSAGE[this.locale],
        recovery_attempted: false,
        recovery_successful: false,
        business_impact: 'unknown',
        next_action: 'standard_error_flow',
        estimated_recovery_time: null,
        alternatives: [],
      };
    }

    const mapping = ERROR_MAPPINGS[errorType];
    const recovery = await this.executeRecoveryAction(mapping.recoveryAction, error, fullContext);

    this.executeInternalAction(mapping.internalAction, errorType, message);
    this.trackBusinessImpact(mapping.businessImpact);
    if (recovery.success) {
      this.recoveryMetrics.user_satisfaction_maintained += 1;
    }

    const retryDelay = fullContext.additionalData?.retry_delay;
    const recoverySeconds = typeof retryDelay === 'number' ? retryDelay : mapping.estimatedRecoverySeconds;

    addBreadcrumb('recovery', `${errorType}: ${mapping.recoveryAction}`, {
      success: recovery.success,
      impact: mapping.businessImpact,
    });

    return {
      user_message: mapping.userMessage[this.locale],
      recovery_attempted: true,
      recovery_successful: recovery.success,
      business_impact: mapping.businessImpact,
      next_action: recovery.nextAction,
      estimated_recovery_time: formatRecoveryTime(recoverySeconds, this.locale),
      alternatives: mapping.alternatives,
      ...(recovery.error ? { error: recovery.error } : {}),
    };
  }

  async executeRecoveryAction(
    actionName: string,
    error: unknown,
    context: ErrorContext
  ): Promise<{ success: boolean; nextAction: string; error?: string }> {
    const action = this.actions.get(actionName);
    if (!action) {
      // The fallback itself lives with the caller (e.g. rule-based matching)
      return { success: true, nextAction: actionName };
    }

    try {
      await action(error, context);
      return { success: true, nextAction: actionName };
    } catch (actionError) {
      const actionMessage = actionError instanceof Error ? actionError.message : String(actionError);
      logger.error('Recovery', `Recovery action ${actionName} failed`, actionMessage);
      return { success: false, nextAction: 'manual_intervention_required', error: actionMessage };
    }
  }

  trackBusinessImpact(impact: string): void {
    const key = `${impact}_count`;
    this.recoveryMetrics[key] = (this.recoveryMetrics[key] ?? 0) + 1;
  }

  getUserExperienceScore(): number {
    const totalErrors = Object.values(this.errorCounts).reduce((sum, count) => sum + count, 0);
    if (totalErrors === 0) {
      return 100;
    }
    const satisfied = this.recoveryMetrics.user_satisfaction_maintained ?? 0;
    return Math.round((satisfied / totalErrors) * 10000) / 100;
  }

  getRecoveryMetrics(): RecoveryMetrics {
    return {
      recovery_metrics: { ...this.recoveryMetrics },
      error_statistics: {
        total_errors: Object.values(this.errorCounts).reduce((sum, count) => sum + count, 0),
        error_counts: { ...this.errorCounts },
      },
      user_experience_score: this.getUserExperienceScore(),
    };
  }

  private executeInternalAction(action: InternalAction, errorType: string, message: string): void {
    switch (action) {
      case 'alert_support_team':
        logger.warn('Recovery', `Support alert: ${errorType}`, message);
        break;
      case 'log_incident':
        logger.warn('Recovery', `Incident recorded: ${errorType}`, message);
        break;
      case 'schedule_retry':
        logger.info('Recovery', `Retry scheduled for ${errorType}`);
        break;
      case 'log_warning':
        logger.warn('Recovery', `${errorType}: ${message}`);
        break;
    }
  }
}

export const recoveryHandler = new UserFriendlyErrorHandler(config.ERROR_LOCALE);
