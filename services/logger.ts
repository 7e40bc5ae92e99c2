import { enrichWithCorrelation, telemetry, type TelemetryScope } from './telemetry';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  agent: string;
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
  correlationId: string;
  scope: TelemetryScope;
}

interface LogOptions {
  correlationId?: string;
  scope?: TelemetryScope;
}

const CONSOLE_WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  INFO: console.log,
  WARN: console.warn,
  ERROR: console.error,
};

class LoggerService {
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 500;
  private quiet = process.env.NODE_ENV === 'test';

  log(agent: string, level: LogLevel, message: string, metadata?: Record<string, unknown>, options?: LogOptions) {
    const baseEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      agent,
      level,
      message,
      metadata,
      correlationId: options?.correlationId || '',
      scope: options?.scope || 'backend',
    };

    const entry = enrichWithCorrelation(baseEntry, options?.correlationId, options?.scope);

    if (this.logs.length >= this.MAX_LOGS) {
      this.logs.shift();
    }
    this.logs.push(entry);

    if (!this.quiet) {
      CONSOLE_WRITERS[level](`[${entry.level}] (${entry.agent}) [${entry.correlationId}]: ${entry.message}`, entry.metadata || '');
    }

    telemetry.emitLog(entry);
  }

  getLogs = (): LogEntry[] => {
    return this.logs;
  };

  clear = () => {
    this.logs = [];
  };
}

export const logger = new LoggerService();
