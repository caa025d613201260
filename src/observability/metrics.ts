/**
 * In-process metrics in Prometheus text exposition format.
 *
 * Counters are kept in memory and reset on restart. Scraped by GET /metrics.
 */

type Labels = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function labelKey(labels: Labels): string {
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) {
    return '';
  }
  return `{${keys.map((key) => `${key}="${escapeLabelValue(labels[key] ?? '')}"`).join(',')}}`;
}

class Counter {
  private readonly values = new Map<string, number>();

  constructor(
    readonly name: string,
    readonly help: string
  ) {}

  inc(labels: Labels = {}, value = 1): void {
    const key = labelKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + value);
  }

  get(labels: Labels = {}): number {
    return this.values.get(labelKey(labels)) ?? 0;
  }

  reset(): void {
    this.values.clear();
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [key, value] of this.values) {
      lines.push(`${this.name}${key} ${value}`);
    }
    return lines;
  }
}

/**
 * Sum/count pair, enough for average latency per route
 */
class Summary {
  private readonly sums = new Map<string, number>();
  private readonly counts = new Map<string, number>();

  constructor(
    readonly name: string,
    readonly help: string
  ) {}

  observe(labels: Labels, value: number): void {
    const key = labelKey(labels);
    this.sums.set(key, (this.sums.get(key) ?? 0) + value);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  reset(): void {
    this.sums.clear();
    this.counts.clear();
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} summary`];
    for (const [key, sum] of this.sums) {
      lines.push(`${this.name}_sum${key} ${Number(sum.toFixed(6))}`);
      lines.push(`${this.name}_count${key} ${this.counts.get(key) ?? 0}`);
    }
    return lines;
  }
}

const httpRequests = new Counter('http_requests_total', 'Total HTTP requests');
const httpDuration = new Summary('http_request_duration_seconds', 'HTTP request duration in seconds');
const appErrors = new Counter('app_errors_total', 'Application errors by code');
const taskRuns = new Counter('scheduler_task_runs_total', 'Scheduled task runs by outcome');

/**
 * Track a finished HTTP request
 */
export function recordHttpRequest(method: string, route: string, status: number, durationSeconds: number): void {
  httpRequests.inc({ method, route, status: String(status) });
  httpDuration.observe({ method, route }, durationSeconds);
}

/**
 * Track an error returned to a client
 */
export function recordError(code: string): void {
  appErrors.inc({ code });
}

/**
 * Track a scheduled task run
 */
export function recordTaskRun(task: string, status: 'completed' | 'failed' | 'skipped'): void {
  taskRuns.inc({ task, status });
}

export function getCounterValue(
  metric: 'http_requests_total' | 'app_errors_total' | 'scheduler_task_runs_total',
  labels: Labels
): number {
  const counter = { http_requests_total: httpRequests, app_errors_total: appErrors, scheduler_task_runs_total: taskRuns }[metric];
  return counter.get(labels);
}

export function renderMetrics(): string {
  const lines = [
    ...httpRequests.render(),
    ...httpDuration.render(),
    ...appErrors.render(),
    ...taskRuns.render(),
    '# HELP process_uptime_seconds Process uptime in seconds',
    '# TYPE process_uptime_seconds gauge',
    `process_uptime_seconds ${Math.round(process.uptime())}`,
    '# HELP nodejs_heap_used_bytes Node.js heap in use',
    '# TYPE nodejs_heap_used_bytes gauge',
    `nodejs_heap_used_bytes ${process.memoryUsage().heapUsed}`,
  ];
  return `${lines.join('\n')}\n`;
}

export function resetMetrics(): void {
  httpRequests.reset();
  httpDuration.reset();
  appErrors.reset();
  taskRuns.reset();
}
