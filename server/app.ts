import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { ClassifierGateway } from '../agents/classifierGateway';
import type { DocumentValidator } from '../agents/documentValidator';
import { logger } from '../services/logger';
import { SessionBusyError } from '../services/sessionLock';
import { telemetry } from '../services/telemetry';
import type { ClassificationRequest, SubmissionMetadata } from '../types';
import type { ServerConfig } from './config';
import { InputError } from './errors';
import { parseMultipart } from './multipart';
import { RequestOrchestrator } from './orchestrator';

export interface AppDeps {
  config: ServerConfig;
  validator: DocumentValidator;
  gateway: ClassifierGateway;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

const isMetadata = (value: unknown): value is SubmissionMetadata =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function parseMetadata(raw: string | undefined): SubmissionMetadata {
  if (raw === undefined) {
    throw new InputError("Metadata inválida: falta el campo 'metadata'");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InputError(`Metadata inválida: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isMetadata(parsed)) {
    throw new InputError('Metadata inválida: se esperaba un objeto JSON');
  }
  return parsed;
}

async function readClassificationRequest(req: Request, maxFileBytes: number): Promise<ClassificationRequest> {
  const { files, fields } = await parseMultipart(req, { maxFileBytes });
  const metadata = parseMetadata(fields.metadata);

  const xml = files.xml;
  const pdf = files.pdf;
  if (!xml) {
    throw new InputError("Falta el archivo 'xml'");
  }
  if (!pdf) {
    throw new InputError("Falta el archivo 'pdf'");
  }

  const category = metadata.categoria_aplicada;
  return {
    xmlBytes: xml.bytes,
    pdfBytes: pdf.bytes,
    xmlFileName: xml.fileName,
    pdfFileName: pdf.fileName,
    originalCategory: typeof category === 'string' ? category : undefined,
    metadata,
  };
}

export function createApp({ config, validator, gateway }: AppDeps) {
  const app = express();
  const orchestrator = new RequestOrchestrator({ validator, gateway });

  app.use(cors());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.locals.correlationId = telemetry.createCorrelationId('backend');
    next();
  });

  app.post('/validate', asyncRoute(async (req, res) => {
    const correlationId = String(res.locals.correlationId);
    const request = await readClassificationRequest(req, config.maxUploadBytes);
    logger.log('HttpServer', 'INFO', `Validación estructural de ${request.xmlFileName} / ${request.pdfFileName}`, undefined, {
      correlationId,
    });
    res.json(await orchestrator.validateStructure(request, correlationId));
  }));

  app.post('/validate_via_gemini', asyncRoute(async (req, res) => {
    const correlationId = String(res.locals.correlationId);
    const request = await readClassificationRequest(req, config.maxUploadBytes);
    logger.log('HttpServer', 'INFO', `Clasificación con el agente de ${request.xmlFileName} / ${request.pdfFileName}`, {
      queued: gateway.queueDepth,
    }, { correlationId });
    res.json(await orchestrator.classifyWithAgent(request, correlationId));
  }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/debug_profile', (_req: Request, res: Response) => {
    res.json({
      GEMINI_USER_DATA: config.browser.userDataDir,
      GEMINI_PROFILE_DIR: config.browser.profileDirectory,
      HEADLESS: config.browser.headless,
      AGENT_DRIVER: config.driver,
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Ruta no encontrada' });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const correlationId = typeof res.locals.correlationId === 'string' ? res.locals.correlationId : undefined;
    if (error instanceof InputError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof SessionBusyError) {
      logger.log('HttpServer', 'WARN', error.message, undefined, { correlationId });
      res.status(503).json({ error: 'Sesión del agente ocupada, intente más tarde' });
      return;
    }
    logger.log('HttpServer', 'ERROR', 'Error no controlado en la solicitud.', {
      error: error instanceof Error ? error.message : String(error),
    }, { correlationId });
    res.status(500).json({ error: 'Error interno' });
  });

  return app;
}
