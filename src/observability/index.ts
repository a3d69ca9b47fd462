/**
 * Observability and tracing for the Gemini client.
 */

import { StatusGroup } from '../protocol';

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Navigation the entry belongs to. */
  context?: RequestContext;
  /** Gemini status code the entry is about. */
  status?: number;
  fields?: Record<string, unknown>;
}

/**
 * One navigation, as seen by logs and tracing hooks.
 */
export interface RequestContext {
  /** Unique within the process. */
  requestId: string;
  /** Operation name, e.g. `navigate`. */
  operation: string;
  /** Address the navigation started from, query included. */
  url: string;
  startTime: Date;
}

let requestSequence = 0;

/**
 * Creates a new request context.
 */
export function createRequestContext(operation: string, url: string): RequestContext {
  requestSequence += 1;
  return {
    requestId: `${operation}-${requestSequence.toString(36)}`,
    operation,
    url,
    startTime: new Date(),
  };
}

/**
 * Logger interface.
 *
 * A numeric `status` field is treated as the Gemini status code of the entry.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, error?: Error, fields?: Record<string, unknown>): void;
  withContext(context: RequestContext): Logger;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/**
 * Logger writing one line per entry to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly context?: RequestContext;

  constructor(minLevel: LogLevel = LogLevel.Info, context?: RequestContext) {
    this.minLevel = minLevel;
    this.context = context;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, { ...fields, error: error?.message, stack: error?.stack });
  }

  withContext(context: RequestContext): Logger {
    return new ConsoleLogger(this.minLevel, context);
  }

  /**
   * Formats an entry as a single line:
   * `<time> [LEVEL] [<request id>] <url> [<status>] message {fields}`.
   */
  format(entry: LogEntry): string {
    const parts: string[] = [entry.timestamp.toISOString(), `[${entry.level.toUpperCase()}]`];

    if (entry.context) {
      parts.push(`[${entry.context.requestId}]`, entry.context.url);
    }
    if (entry.status !== undefined) {
      parts.push(`[${entry.status}]`);
    }

    parts.push(entry.message);

    if (entry.fields && Object.keys(entry.fields).length > 0) {
      parts.push(JSON.stringify(entry.fields));
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.minLevel)) {
      return;
    }

    const { status, ...rest }: Record<string, unknown> = fields ?? {};
    const code = typeof status === 'number' ? status : undefined;
    const output = this.format({
      level,
      message,
      timestamp: new Date(),
      context: this.context,
      status: code,
      fields: code === undefined ? fields : rest,
    });

    switch (level) {
      case LogLevel.Debug:
        console.debug(output);
        break;
      case LogLevel.Info:
        console.info(output);
        break;
      case LogLevel.Warn:
        console.warn(output);
        break;
      case LogLevel.Error:
        console.error(output);
        break;
    }
  }
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  debug(): void {
    // No-op
  }
  info(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  error(): void {
    // No-op
  }
  withContext(): Logger {
    return this;
  }
}

/**
 * Gemini client metrics.
 */
export interface GeminiMetrics {
  /** Navigations started. */
  requestsStarted: number;
  /** Navigations that finished without error. */
  requestsCompleted: number;
  /** Navigations that ended in an error. */
  requestsFailed: number;
  /** Navigations superseded or cancelled. */
  requestsCancelled: number;
  /** Redirects followed. */
  redirectsFollowed: number;
  /** Input prompts shown. */
  inputPrompts: number;
  /** Bytes written by binary saves. */
  bytesSaved: number;
  /** Status lines received, by group. */
  responsesByGroup: Record<StatusGroup, number>;
  /** Navigation latency samples (ms). */
  requestLatencyMs: number[];
}

/**
 * Creates empty metrics.
 */
export function createEmptyMetrics(): GeminiMetrics {
  return {
    requestsStarted: 0,
    requestsCompleted: 0,
    requestsFailed: 0,
    requestsCancelled: 0,
    redirectsFollowed: 0,
    inputPrompts: 0,
    bytesSaved: 0,
    responsesByGroup: {
      [StatusGroup.Input]: 0,
      [StatusGroup.Success]: 0,
      [StatusGroup.Redirect]: 0,
      [StatusGroup.TemporaryFailure]: 0,
      [StatusGroup.PermanentFailure]: 0,
      [StatusGroup.Unknown]: 0,
    },
    requestLatencyMs: [],
  };
}

/**
 * Metrics collector.
 */
export class MetricsCollector {
  private metrics: GeminiMetrics = createEmptyMetrics();

  /** Records a navigation start. */
  recordRequestStarted(): void {
    this.metrics.requestsStarted++;
  }

  /** Records a finished navigation. */
  recordRequestCompleted(latencyMs: number): void {
    this.metrics.requestsCompleted++;
    this.metrics.requestLatencyMs.push(latencyMs);
  }

  /** Records a failed navigation. */
  recordRequestFailed(): void {
    this.metrics.requestsFailed++;
  }

  /** Records a cancelled navigation. */
  recordRequestCancelled(): void {
    this.metrics.requestsCancelled++;
  }

  /** Records a status line. */
  recordResponse(group: StatusGroup): void {
    this.metrics.responsesByGroup[group]++;
  }

  /** Records a followed redirect. */
  recordRedirect(): void {
    this.metrics.redirectsFollowed++;
  }

  /** Records an input prompt. */
  recordInputPrompt(): void {
    this.metrics.inputPrompts++;
  }

  /** Records a binary save. */
  recordBytesSaved(bytes: number): void {
    this.metrics.bytesSaved += bytes;
  }

  /** Gets current metrics. */
  getMetrics(): GeminiMetrics {
    return {
      ...this.metrics,
      responsesByGroup: { ...this.metrics.responsesByGroup },
      requestLatencyMs: [...this.metrics.requestLatencyMs],
    };
  }

  /** Gets computed statistics. */
  getStats(): {
    successRate: number;
    avgLatencyMs: number;
    p95LatencyMs: number;
  } {
    const finished = this.metrics.requestsCompleted + this.metrics.requestsFailed;
    const successRate = finished > 0 ? this.metrics.requestsCompleted / finished : 1;

    return {
      successRate,
      avgLatencyMs: this.average(this.metrics.requestLatencyMs),
      p95LatencyMs: this.percentile(this.metrics.requestLatencyMs, 95),
    };
  }

  /** Resets all metrics. */
  reset(): void {
    this.metrics = createEmptyMetrics();
  }

  private average(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => a + b, 0) / values.length;
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  }
}

/**
 * Timer for measuring durations.
 */
export class Timer {
  private readonly startTime: number;

  private constructor() {
    this.startTime = Date.now();
  }

  /** Starts a new timer. */
  static start(): Timer {
    return new Timer();
  }

  /** Gets elapsed time in milliseconds. */
  elapsed(): number {
    return Date.now() - this.startTime;
  }
}

/**
 * Tracing hook for Gemini requests.
 */
export interface TracingHook {
  /** Called when a navigation starts. */
  onRequestStart?(context: RequestContext, url: string): void;
  /** Called when a TLS connection is established. */
  onConnect?(host: string, port: number, durationMs: number): void;
  /** Called for every status line received. */
  onStatus?(context: RequestContext, code: number, meta: string): void;
  /** Called after a navigation completes successfully. */
  onRequestSuccess?(context: RequestContext, durationMs: number): void;
  /** Called after a navigation fails. */
  onRequestError?(context: RequestContext, error: Error, durationMs: number): void;
  /** Called when a navigation is superseded or cancelled. */
  onRequestCancelled?(context: RequestContext): void;
}

/**
 * Composite tracing hook that delegates to multiple hooks.
 */
export class CompositeTracingHook implements TracingHook {
  private readonly hooks: TracingHook[] = [];

  /** Adds a hook. */
  addHook(hook: TracingHook): void {
    this.hooks.push(hook);
  }

  /** Removes a hook. */
  removeHook(hook: TracingHook): void {
    const index = this.hooks.indexOf(hook);
    if (index !== -1) {
      this.hooks.splice(index, 1);
    }
  }

  onRequestStart(context: RequestContext, url: string): void {
    for (const hook of this.hooks) {
      hook.onRequestStart?.(context, url);
    }
  }

  onConnect(host: string, port: number, durationMs: number): void {
    for (const hook of this.hooks) {
      hook.onConnect?.(host, port, durationMs);
    }
  }

  onStatus(context: RequestContext, code: number, meta: string): void {
    for (const hook of this.hooks) {
      hook.onStatus?.(context, code, meta);
    }
  }

  onRequestSuccess(context: RequestContext, durationMs: number): void {
    for (const hook of this.hooks) {
      hook.onRequestSuccess?.(context, durationMs);
    }
  }

  onRequestError(context: RequestContext, error: Error, durationMs: number): void {
    for (const hook of this.hooks) {
      hook.onRequestError?.(context, error, durationMs);
    }
  }

  onRequestCancelled(context: RequestContext): void {
    for (const hook of this.hooks) {
      hook.onRequestCancelled?.(context);
    }
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(minLevel?: LogLevel): Logger {
  return new ConsoleLogger(minLevel);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}

/**
 * Creates a metrics collector.
 */
export function createMetricsCollector(): MetricsCollector {
  return new MetricsCollector();
}
