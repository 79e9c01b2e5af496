import { randomUUID } from 'crypto';
import { ValidtreeError } from './validtree-error';
import { ErrorContext } from './types';

export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

type LogLevel = 'warn' | 'error';

const DEFAULT_SINK: LogSink = console;

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function generateCorrelationId(): string {
  try {
    return randomUUID();
  } catch {
    const rand = Math.random().toString(36).slice(2, 10);
    return `cid-${Date.now().toString(36)}-${rand}`;
  }
}

/**
 * Writes one JSON line per event. Lines that cannot be serialized fall back
 * to a bracketed plain-text form.
 */
export class ErrorLogger {
  constructor(private readonly sink: LogSink = DEFAULT_SINK) {}

  ensureCorrelationId(context?: ErrorContext): string {
    if (context?.correlationId && typeof context.correlationId === 'string') {
      return context.correlationId;
    }
    return generateCorrelationId();
  }

  logError(error: ValidtreeError, contextOverride?: ErrorContext): string {
    const correlationId = this.ensureCorrelationId(contextOverride ?? error.context);
    const mergedContext: ErrorContext = {
      ...error.context,
      ...contextOverride,
      correlationId,
    };

    error.context = mergedContext;

    const level: LogLevel = error.severity === 'warning' ? 'warn' : 'error';
    this.emit(level, correlationId, error.message, {
      code: error.code,
      category: error.category,
      severity: error.severity,
      context: mergedContext,
      stack: error.stack,
    });

    return correlationId;
  }

  private emit(
    level: LogLevel,
    correlationId: string,
    message: string,
    fields: Record<string, unknown>
  ): void {
    const timestamp = new Date().toISOString();
    const line = safeStringify({ level, timestamp, correlationId, message, ...fields });
    const write = this.sink[level].bind(this.sink);
    write(
      line ??
        `[${timestamp}] [${level.toUpperCase()}] ${message} (correlationId=${correlationId})`
    );
  }
}
