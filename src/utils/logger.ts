/**
 * Console logger with short, colored output for monitoring and debugging
 * Supports LOG_LEVEL env var: debug | info | warn | error (default: info)
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const colors = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
  reset: '\x1b[0m',
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelPriority;
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

function formatTime(): string {
  return new Date().toISOString().substring(11, 23);
}

function formatData(data: unknown): string {
  // Error objects don't serialize with JSON.stringify
  if (data instanceof Error) {
    return `${data.name}: ${data.message}${data.stack ? `\n${data.stack}` : ''}`;
  }
  if (typeof data === 'object' && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

function write(level: LogLevel, context: string, message: string, data?: unknown, tag = ''): void {
  const color = colors[level];
  const prefix = `${colors.reset}[${formatTime()}] ${color}${level.toUpperCase().padEnd(5)}${colors.reset}`;
  const line = `${prefix}${tag} [${context}] ${message}`;
  const out = level === 'error' ? console.error : console.log;

  if (data !== undefined) {
    out(line, formatData(data));
  } else {
    out(line);
  }
}

function log(level: LogLevel, context: string, message: string, data?: unknown): void {
  if (levelPriority[level] < levelPriority[getLogLevel()]) {
    return;
  }
  write(level, context, message, data);
}

export const logger = {
  debug: (context: string, message: string, data?: unknown) => log('debug', context, message, data),
  info: (context: string, message: string, data?: unknown) => log('info', context, message, data),
  warn: (context: string, message: string, data?: unknown) => log('warn', context, message, data),
  error: (context: string, message: string, data?: unknown) => log('error', context, message, data),
};

/**
 * Logger scoped to a single scheduled task run.
 * Every line carries the task name and a short run id so one run can be followed in the output.
 * With verbose enabled, debug lines are printed regardless of LOG_LEVEL.
 */
export class TaskLogger {
  private readonly context: string;

  constructor(
    readonly taskName: string,
    readonly runId: string,
    private readonly verbose = false
  ) {
    this.context = `${taskName}:${runId.slice(0, 8)}`;
  }

  debug(message: string, data?: unknown): void {
    if (this.verbose) {
      write('debug', this.context, message, data, ` ${colors.warn}[VERBOSE]${colors.reset}`);
    } else {
      log('debug', this.context, message, data);
    }
  }

  info(message: string, data?: unknown): void {
    log('info', this.context, message, data);
  }

  warn(message: string, data?: unknown): void {
    log('warn', this.context, message, data);
  }

  error(message: string, data?: unknown): void {
    log('error', this.context, message, data);
  }
}

export function createTaskLogger(taskName: string, runId: string, verbose = false): TaskLogger {
  return new TaskLogger(taskName, runId, verbose);
}

export default logger;
