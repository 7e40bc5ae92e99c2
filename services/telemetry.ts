import {
  diag,
  DiagConsoleLogger,
  DiagLogLevel,
  metrics,
  trace,
  SpanStatusCode,
  type Attributes,
  type Counter,
  type Histogram,
  type UpDownCounter,
} from '@opentelemetry/api';
import { logs } from '@opentelemetry/api-logs';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { LoggerProvider, BatchLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { v4 as uuid } from 'uuid';
import { telemetryConfig } from '../telemetry/config';
import { sendAlert } from './telemetryAlerts';
import type { LogEntry } from './logger';

diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN);

type MetricCache = {
  latency: Record<string, Histogram>;
  errors: Record<string, Counter>;
  throughput: Record<string, UpDownCounter>;
};

export type IntegrationScope = 'agent' | 'validation';
export type TelemetryScope = IntegrationScope | 'backend';

export interface TelemetrySpanOptions {
  attributes?: Attributes;
  scope?: TelemetryScope;
  correlationId?: string;
}

export interface ThresholdStats {
  latencyMs?: number;
  errorRate?: number;
  throughput?: number;
  consecutiveFailures?: number;
}

const isIntegrationScope = (scope: TelemetryScope): scope is IntegrationScope =>
  scope === 'agent' || scope === 'validation';

function parseHeaders(raw?: string): Record<string, string> | undefined {
  if (!raw) return undefined;
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry): [string, string] => {
      const separator = entry.indexOf('=');
      return separator === -1 ? [entry, ''] : [entry.slice(0, separator), entry.slice(separator + 1)];
    });
  return Object.fromEntries(entries);
}

/** Flattens log metadata into OpenTelemetry attribute values. */
export function toAttributes(metadata: Record<string, unknown> = {}): Record<string, string> {
  return Object.fromEntries(
    Object.entries(metadata)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => [key, typeof value === 'string' ? value : JSON.stringify(value)]),
  );
}

class TelemetryService {
  private tracerProvider?: NodeTracerProvider;
  private meterProvider?: MeterProvider;
  private loggerProvider?: LoggerProvider;
  private initialized = false;
  private metricCache: MetricCache = {
    latency: {},
    errors: {},
    throughput: {},
  };
  private consecutiveFailures: Record<IntegrationScope, number> = { agent: 0, validation: 0 };

  init() {
    if (this.initialized) return;
    this.initialized = true;

    // without registered providers the @opentelemetry/api globals stay no-op
    if (!telemetryConfig.enabled) return;

    const resource = new Resource({
      [ATTR_SERVICE_NAME]: telemetryConfig.serviceName,
      [ATTR_SERVICE_VERSION]: telemetryConfig.serviceVersion,
      'deployment.environment': telemetryConfig.environment,
    });

    const headers = parseHeaders(telemetryConfig.otlpHeaders);

    this.tracerProvider = new NodeTracerProvider({ resource });
    const traceExporter = new OTLPTraceExporter({
      url: `${telemetryConfig.otlpEndpoint}/v1/traces`,
      headers,
    });
    this.tracerProvider.addSpanProcessor(new BatchSpanProcessor(traceExporter));
    this.tracerProvider.register();

    this.meterProvider = new MeterProvider({ resource });
    const metricExporter = new OTLPMetricExporter({
      url: `${telemetryConfig.otlpEndpoint}/v1/metrics`,
      headers,
    });
    this.meterProvider.addMetricReader(
      new PeriodicExportingMetricReader({ exporter: metricExporter, exportIntervalMillis: 10000 }),
    );
    metrics.setGlobalMeterProvider(this.meterProvider);

    this.loggerProvider = new LoggerProvider({ resource });
    const logExporter = new OTLPLogExporter({
      url: `${telemetryConfig.otlpEndpoint}/v1/logs`,
      headers,
    });
    this.loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(logExporter));
    logs.setGlobalLoggerProvider(this.loggerProvider);
  }

  async shutdown(): Promise<void> {
    await Promise.all([
      this.tracerProvider?.shutdown(),
      this.meterProvider?.shutdown(),
      this.loggerProvider?.shutdown(),
    ]);
  }

  getTracer() {
    this.init();
    return trace.getTracer(telemetryConfig.serviceName);
  }

  getMeter(scope: string) {
    this.init();
    return metrics.getMeter(scope);
  }

  getLogger(scope: string) {
    this.init();
    return logs.getLogger(scope);
  }

  createCorrelationId(scope: TelemetryScope, parent?: string) {
    return parent ? `${parent}:${scope}:${uuid()}` : `${scope}:${uuid()}`;
  }

  runWithSpan<T>(name: string, fn: () => Promise<T> | T, options: TelemetrySpanOptions = {}): Promise<T> {
    const tracer = this.getTracer();
    const correlationId = options.correlationId || this.createCorrelationId(options.scope || 'backend');

    return tracer.startActiveSpan(
      name,
      {
        attributes: {
          'app.scope': options.scope,
          'correlation.id': correlationId,
          ...options.attributes,
        },
      },
      async (span) => {
        try {
          const result = await fn();
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      },
    );
  }

  recordLatency(scope: TelemetryScope, name: string, durationMs: number, attributes?: Attributes) {
    const meter = this.getMeter(scope);
    const key = `${scope}.${name}`;
    if (!this.metricCache.latency[key]) {
      this.metricCache.latency[key] = meter.createHistogram('latency_ms', {
        description: 'Tiempo de respuesta en milisegundos',
      });
    }
    this.metricCache.latency[key].record(durationMs, { scope, target: name, ...attributes });
  }

  recordError(scope: TelemetryScope, name: string, attributes?: Attributes) {
    const meter = this.getMeter(scope);
    const key = `${scope}.${name}`;
    if (!this.metricCache.errors[key]) {
      this.metricCache.errors[key] = meter.createCounter('error_rate', {
        description: 'Número de errores registrados',
      });
    }
    this.metricCache.errors[key].add(1, { scope, target: name, ...attributes });
  }

  recordThroughput(scope: TelemetryScope, name: string, delta: number, attributes?: Attributes) {
    const meter = this.getMeter(scope);
    const key = `${scope}.${name}`;
    if (!this.metricCache.throughput[key]) {
      this.metricCache.throughput[key] = meter.createUpDownCounter('throughput', {
        description: 'Elementos procesados por integración',
      });
    }
    this.metricCache.throughput[key].add(delta, { scope, target: name, ...attributes });
  }

  /** Tracks failed outcomes in a row per scope; any success resets the streak. */
  recordOutcome(scope: IntegrationScope, succeeded: boolean): number {
    this.consecutiveFailures[scope] = succeeded ? 0 : this.consecutiveFailures[scope] + 1;
    return this.consecutiveFailures[scope];
  }

  emitLog(entry: LogEntry) {
    const logger = this.getLogger(entry.agent || telemetryConfig.serviceName);
    logger.emit({
      severityText: entry.level,
      body: entry.message,
      attributes: {
        ...toAttributes(entry.metadata),
        timestamp: entry.timestamp,
        correlationId: entry.correlationId,
        scope: entry.scope,
      },
    });
  }

  async evaluateThresholds(scope: IntegrationScope, stats: ThresholdStats) {
    const thresholds = telemetryConfig.thresholds[scope];

    const breaches: string[] = [];
    if (stats.latencyMs && stats.latencyMs > thresholds.latencyMs) {
      breaches.push(`latencia ${stats.latencyMs.toFixed(0)}ms > ${thresholds.latencyMs}ms`);
    }
    if (stats.errorRate && stats.errorRate > thresholds.errorRate) {
      breaches.push(`tasa de error ${(stats.errorRate * 100).toFixed(1)}% > ${(thresholds.errorRate * 100).toFixed(1)}%`);
    }
    if (stats.throughput !== undefined && stats.throughput < thresholds.throughputMin) {
      breaches.push(`throughput ${stats.throughput} < ${thresholds.throughputMin}`);
    }
    if (stats.consecutiveFailures && stats.consecutiveFailures >= thresholds.consecutiveFailures) {
      breaches.push(`fallos consecutivos ${stats.consecutiveFailures} >= ${thresholds.consecutiveFailures}`);
    }

    if (breaches.length > 0) {
      await sendAlert(scope, breaches);
    }
    return breaches;
  }

  /** Same check without making the caller wait for alert delivery. */
  watchThresholds(scope: IntegrationScope, stats: ThresholdStats): void {
    this.evaluateThresholds(scope, stats).catch((error: unknown) => {
      diag.error('No se pudieron evaluar los umbrales de telemetría', error);
    });
  }
}

export const telemetry = new TelemetryService();

export async function measureExecution<T>(
  scope: TelemetryScope,
  name: string,
  fn: () => Promise<T> | T,
  options: TelemetrySpanOptions = {},
): Promise<T> {
  const start = performance.now();
  try {
    const result = await telemetry.runWithSpan(name, fn, { ...options, scope });
    const end = performance.now();
    telemetry.recordLatency(scope, name, end - start, options.attributes);
    telemetry.recordThroughput(scope, name, 1, options.attributes);
    if (isIntegrationScope(scope)) {
      telemetry.watchThresholds(scope, { latencyMs: end - start, throughput: 1 });
    }
    return result;
  } catch (error) {
    const end = performance.now();
    telemetry.recordError(scope, name, { error: error instanceof Error ? error.message : String(error) });
    if (isIntegrationScope(scope)) {
      telemetry.watchThresholds(scope, { latencyMs: end - start, errorRate: 1 });
    }
    throw error;
  }
}

export function enrichWithCorrelation(entry: LogEntry, correlationId?: string, scope: TelemetryScope = 'backend'): LogEntry {
  return {
    ...entry,
    correlationId: correlationId || telemetry.createCorrelationId(scope),
    scope,
  };
}
