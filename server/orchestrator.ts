import type { ClassifierGateway } from '../agents/classifierGateway';
import type { DocumentValidator } from '../agents/documentValidator';
import { logger } from '../services/logger';
import { SessionBusyError } from '../services/sessionLock';
import type {
  AgentClassificationResponse,
  ClassificationRequest,
  GatewayOutcome,
  StructuralValidationResponse,
} from '../types';
import { mapErrorCategory } from '../utils/errorCategory';
import { withStagedFiles } from '../utils/fileUtils';

export interface OrchestratorDeps {
  validator: DocumentValidator;
  gateway: ClassifierGateway;
  stageFiles?: typeof withStagedFiles;
}

const AGENT = 'RequestOrchestrator';

/**
 * Turns a classification request into exactly one normalized response body. Every failure becomes
 * an error body except `SessionBusyError`, which escapes `classifyWithAgent`.
 */
export class RequestOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async validateStructure(request: ClassificationRequest, correlationId?: string): Promise<StructuralValidationResponse> {
    const base = {
      ...request.metadata,
      xmlFileName: request.xmlFileName,
      pdfFileName: request.pdfFileName,
    };

    const outcome = await this.deps.validator.validate(request.pdfBytes, request.xmlBytes, correlationId);
    if (outcome.status === 'Rejected') {
      return {
        ...base,
        estado: 'Error',
        categoria_aplicada: mapErrorCategory(request.originalCategory),
        detalle_error: outcome.failureReason,
      };
    }

    return {
      ...base,
      estado: 'Procesada',
      categoria_aplicada: request.metadata.categoria_aplicada ?? null,
      detalle_error: null,
    };
  }

  async classifyWithAgent(request: ClassificationRequest, correlationId?: string): Promise<AgentClassificationResponse> {
    const stageFiles = this.deps.stageFiles ?? withStagedFiles;
    let outcome: GatewayOutcome;
    try {
      outcome = await stageFiles(
        [
          { name: request.pdfFileName, bytes: request.pdfBytes },
          { name: request.xmlFileName, bytes: request.xmlBytes },
        ],
        ([pdfPath, xmlPath]) => this.deps.gateway.classify({ pdfPath, xmlPath }, { correlationId }),
      );
    } catch (error) {
      if (error instanceof SessionBusyError) {
        throw error;
      }
      logger.log(AGENT, 'ERROR', 'No se pudieron preparar los archivos para el agente.', {
        error: error instanceof Error ? error.message : String(error),
      }, { correlationId, scope: 'backend' });
      return this.unclassified(request);
    }

    if (outcome.status === 'classified') {
      return {
        documentType: outcome.result.documentType,
        categoria_aplicada: outcome.result.appliedCategory || request.originalCategory || mapErrorCategory(request.originalCategory),
      };
    }

    logger.log(AGENT, 'WARN', `Clasificación sin resultado (${outcome.status}); se aplica la categoría de error.`, {
      ...(outcome.status === 'failed' ? { stage: outcome.stage, snapshot: outcome.snapshot } : { rawText: outcome.rawText }),
    }, { correlationId, scope: 'backend' });

    return this.unclassified(request);
  }

  private unclassified(request: ClassificationRequest): AgentClassificationResponse {
    return {
      documentType: 'Unknown',
      categoria_aplicada: mapErrorCategory(request.originalCategory),
    };
  }
}
