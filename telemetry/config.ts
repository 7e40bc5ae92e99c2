import { env, envBool, envNumber } from '../utils/env';

type ThresholdConfig = {
  latencyMs: number;
  errorRate: number;
  throughputMin: number;
  consecutiveFailures: number;
};

export interface TelemetryConfig {
  enabled: boolean;
  serviceName: string;
  serviceVersion: string;
  environment: string;
  otlpEndpoint: string;
  otlpHeaders?: string;
  alertWebhooks: {
    slack?: string;
    discord?: string;
  };
  alertTimeoutMs: number;
  thresholds: {
    agent: ThresholdConfig;
    validation: ThresholdConfig;
  };
}

export const telemetryConfig: TelemetryConfig = {
  enabled: envBool('TELEMETRY_ENABLED', false),
  serviceName: env('TELEMETRY_SERVICE', 'invoice-pair-classifier'),
  serviceVersion: env('APP_VERSION', '1.0.0'),
  environment: env('APP_ENV', 'development'),
  otlpEndpoint: env('OTLP_ENDPOINT', 'http://localhost:4318'),
  otlpHeaders: env('OTLP_HEADERS', ''),
  alertWebhooks: {
    slack: env('SLACK_WEBHOOK'),
    discord: env('DISCORD_WEBHOOK'),
  },
  alertTimeoutMs: envNumber('ALERT_TIMEOUT_MS', 5000),
  thresholds: {
    // a classification round-trip through the agent UI routinely takes tens of seconds
    agent: {
      latencyMs: envNumber('AGENT_LATENCY_THRESHOLD', 60000),
      errorRate: envNumber('AGENT_ERROR_THRESHOLD', 0.2),
      throughputMin: envNumber('AGENT_THROUGHPUT_MIN', 1),
      consecutiveFailures: envNumber('AGENT_FAILURE_THRESHOLD', 3),
    },
    validation: {
      latencyMs: envNumber('VALIDATION_LATENCY_THRESHOLD', 3000),
      errorRate: envNumber('VALIDATION_ERROR_THRESHOLD', 0.5),
      throughputMin: envNumber('VALIDATION_THROUGHPUT_MIN', 1),
      consecutiveFailures: envNumber('VALIDATION_FAILURE_THRESHOLD', 5),
    },
  },
};
