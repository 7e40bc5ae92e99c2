import { telemetryConfig } from '../telemetry/config';
import { logger } from './logger';
import type { IntegrationScope } from './telemetry';

async function postWebhook(url: string, payload: unknown) {
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(telemetryConfig.alertTimeoutMs),
    });
    if (!response.ok) {
      logger.log('Alerting', 'WARN', `Webhook de alertas respondió ${response.status}.`, { url });
    }
  } catch (error) {
    logger.log('Alerting', 'ERROR', 'Fallo al enviar alerta al webhook.', {
      error: error instanceof Error ? error.message : String(error),
      url,
    });
  }
}

export async function sendAlert(scope: IntegrationScope, breaches: string[]) {
  const message = `Alerta de telemetría (${scope.toUpperCase()}): ${breaches.join('; ')}`;
  const payload = {
    text: message,
    scope,
    breaches,
    timestamp: new Date().toISOString(),
  };

  if (telemetryConfig.alertWebhooks.slack) {
    await postWebhook(telemetryConfig.alertWebhooks.slack, payload);
  }

  if (telemetryConfig.alertWebhooks.discord) {
    await postWebhook(telemetryConfig.alertWebhooks.discord, { content: message });
  }

  logger.log('Alerting', 'WARN', 'Umbral de telemetría excedido.', {
    scope,
    breaches,
  });
}
