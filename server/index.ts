import './loadEnv';
import { mkdir } from 'node:fs/promises';
import type { Server } from 'node:http';
import type { AgentSession } from '../agents/agentSession';
import { BrowserAgentSession } from '../agents/browserAgentSession';
import { ClassifierGateway } from '../agents/classifierGateway';
import { DocumentValidator } from '../agents/documentValidator';
import { GeminiApiSession } from '../agents/geminiApiSession';
import { loadSelectorCatalog } from '../agents/selectorCatalog';
import { logger } from '../services/logger';
import { telemetry } from '../services/telemetry';
import { createApp } from './app';
import { loadServerConfig, type ServerConfig } from './config';

export function createSessionFactory(config: ServerConfig): () => AgentSession {
  if (config.driver === 'api') {
    return () => new GeminiApiSession({ ...config.gemini, stageTimeoutMs: config.gateway.stageTimeoutMs });
  }
  const selectors = loadSelectorCatalog(config.browser.selectorsPath);
  return () =>
    new BrowserAgentSession({
      ...config.browser,
      stageTimeoutMs: config.gateway.stageTimeoutMs,
      snapshotDir: config.snapshotDir,
      selectors,
    });
}

export const startServer = async (config: ServerConfig = loadServerConfig()) => {
  if (config.driver === 'browser') {
    // the profile directory is the one resource the process cannot run without
    await mkdir(config.browser.userDataDir, { recursive: true });
  }

  const gateway = new ClassifierGateway({
    createSession: createSessionFactory(config),
    maxQueued: config.gateway.maxQueued,
    timings: config.gateway,
  });
  const app = createApp({ config, validator: new DocumentValidator(), gateway });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => {
      logger.log('HttpServer', 'INFO', `Servidor de clasificación escuchando en el puerto ${config.port}`);
      resolve(listening);
    });
  });

  void gateway.warmUp();

  const shutdown = async (signal: string) => {
    logger.log('HttpServer', 'INFO', `Recibido ${signal}, cerrando.`);
    server.close();
    try {
      await gateway.shutdown();
      await telemetry.shutdown();
    } catch (error) {
      logger.log('HttpServer', 'ERROR', 'Fallo al cerrar la sesión del agente.', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    process.exit(0);
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  return { server, gateway };
};

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.log('HttpServer', 'ERROR', 'No se pudo iniciar el servidor.', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
