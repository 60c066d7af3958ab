/**
 * Logging, metrics and tracing hooks for the Jira client.
 *
 * Everything defaults to no-op; in-memory implementations back the tests.
 */

// ============================================================================
// Logger
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const DEFAULT_REDACT_KEYS = ['token', 'apitoken', 'authorization', 'secret', 'password'];

/**
 * Writes one JSON line per entry to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set((options.redactKeys ?? DEFAULT_REDACT_KEYS).map(k => k.toLowerCase()));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = this.redact({ ...this.context, ...context });
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(mergedContext).length > 0 ? { context: mergedContext } : {}),
    });

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Stores entries for assertions.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.ERROR, message, context);
  }

  private addEntry(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level, message, timestamp: new Date(), context });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metric names emitted by the client.
 */
export const MetricNames = {
  OPERATIONS_TOTAL: 'jira_operations_total',
  OPERATION_LATENCY: 'jira_operation_latency_ms',
  ERRORS_TOTAL: 'jira_errors_total',
} as const;

export interface MetricEntry {
  name: string;
  value: number;
  timestamp: Date;
  labels?: Record<string, string>;
}

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  /** Increment a counter (default step 1) */
  increment(name: string, value?: number, labels?: Record<string, string>): void;
  /** Record a duration in milliseconds */
  timing(name: string, durationMs: number, labels?: Record<string, string>): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly counters: Map<string, number> = new Map();

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.entries.push({ name, value, labels, timestamp: new Date() });
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    this.entries.push({ name, value: durationMs, labels, timestamp: new Date() });
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) return name;
    const sortedLabels = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${sortedLabels}}`;
  }

  getMetrics(): MetricEntry[] {
    return [...this.entries];
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  clear(): void {
    this.entries.length = 0;
    this.counters.clear();
  }
}

// ============================================================================
// Tracer
// ============================================================================

export type SpanStatus = 'OK' | 'ERROR';

export interface SpanContext {
  setAttribute(key: string, value: string | number | boolean): void;
  setStatus(status: SpanStatus): void;
  recordException(error: Error): void;
}

/**
 * Tracer interface.
 */
export interface Tracer {
  /**
   * Runs `fn` inside a span and returns its result.
   */
  withSpan<T>(
    name: string,
    fn: (span: SpanContext) => Promise<T>,
    attributes?: Record<string, unknown>
  ): Promise<T>;
}

export class NoopTracer implements Tracer {
  private readonly noopSpan: SpanContext = {
    setAttribute: () => {},
    setStatus: () => {},
    recordException: () => {},
  };

  async withSpan<T>(
    _name: string,
    fn: (span: SpanContext) => Promise<T>,
    _attributes?: Record<string, unknown>
  ): Promise<T> {
    return fn(this.noopSpan);
  }
}

export class InMemorySpanContext implements SpanContext {
  readonly name: string;
  readonly attributes: Record<string, string | number | boolean> = {};
  status: SpanStatus = 'OK';
  exception?: Error;
  readonly startTime: Date;
  endTime?: Date;

  constructor(name: string, attributes?: Record<string, unknown>) {
    this.name = name;
    this.startTime = new Date();
    for (const [key, value] of Object.entries(attributes ?? {})) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        this.attributes[key] = value;
      }
    }
  }

  setAttribute(key: string, value: string | number | boolean): void {
    this.attributes[key] = value;
  }

  setStatus(status: SpanStatus): void {
    this.status = status;
  }

  recordException(error: Error): void {
    this.exception = error;
    this.status = 'ERROR';
  }

  end(): void {
    this.endTime = new Date();
  }
}

export class InMemoryTracer implements Tracer {
  private readonly spans: InMemorySpanContext[] = [];

  async withSpan<T>(
    name: string,
    fn: (span: SpanContext) => Promise<T>,
    attributes?: Record<string, unknown>
  ): Promise<T> {
    const span = new InMemorySpanContext(name, attributes);
    this.spans.push(span);
    try {
      return await fn(span);
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      } else {
        span.setStatus('ERROR');
      }
      throw error;
    } finally {
      span.end();
    }
  }

  getSpans(): InMemorySpanContext[] {
    return [...this.spans];
  }

  getSpansByName(name: string): InMemorySpanContext[] {
    return this.spans.filter(s => s.name === name);
  }

  clear(): void {
    this.spans.length = 0;
  }
}

// ============================================================================
// Observability Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

/**
 * In-memory container whose parts can be inspected after a call.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}

/**
 * Console logger with no-op metrics and tracing.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}
