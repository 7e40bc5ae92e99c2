import { logger } from '../services/logger';
import { SessionLock } from '../services/sessionLock';
import { measureExecution, telemetry } from '../services/telemetry';
import type { AgentFiles, GatewayOutcome, StageName, StageResult } from '../types';
import { CLASSIFICATION_PROMPT, NO_ANSWER_TEXT } from './agentPrompt';
import type { AgentSession } from './agentSession';
import { parseAgentAnswer } from './answerParser';

export interface GatewayTimings {
  answerTimeoutMs: number;
  stablePauseMs: number;
  pollIntervalMs: number;
}

export interface ClassifierGatewayOptions {
  createSession: () => AgentSession;
  maxQueued: number;
  timings: GatewayTimings;
  prompt?: string;
}

interface ClassifyOptions {
  correlationId?: string;
}

const AGENT = 'ClassifierGateway';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Serialized access to the external agent. Owns the single session (created on first use and
 * kept for the life of the process) and the lock every attempt runs under. Never retries.
 */
export class ClassifierGateway {
  private session: AgentSession | null = null;
  private readonly lock: SessionLock;
  private readonly prompt: string;

  constructor(private readonly options: ClassifierGatewayOptions) {
    this.lock = new SessionLock(options.maxQueued);
    this.prompt = options.prompt ?? CLASSIFICATION_PROMPT;
  }

  get queueDepth(): number {
    return this.lock.pending;
  }

  get busy(): boolean {
    return this.lock.locked;
  }

  /**
   * One classification attempt. Rejects only with `SessionBusyError` when the wait queue is
   * full; every other failure is reported in the outcome.
   */
  async classify(files: AgentFiles, { correlationId }: ClassifyOptions = {}): Promise<GatewayOutcome> {
    const outcome = await this.lock.runExclusive(() =>
      measureExecution('agent', 'gateway.classify', () => this.attempt(files, correlationId), { correlationId }),
    );
    // outside the lock: alert delivery must not hold the session
    const failures = telemetry.recordOutcome('agent', outcome.status === 'classified');
    if (failures > 0) {
      telemetry.watchThresholds('agent', { consecutiveFailures: failures });
    }
    return outcome;
  }

  /** Opens the session ahead of the first request. Failures are logged, not raised. */
  async warmUp(): Promise<StageResult> {
    return this.lock.runExclusive(async () => {
      try {
        const result = await this.getSession().ensureReady();
        if (result.status !== 'ready') {
          logger.log(AGENT, 'WARN', `Precarga de la sesión incompleta: ${result.detail}`);
        }
        return result;
      } catch (error) {
        const detail = errorMessage(error);
        logger.log(AGENT, 'WARN', `No se pudo precargar la sesión del agente: ${detail}`);
        return { status: 'not_found', detail };
      }
    });
  }

  async shutdown(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await session.close();
    }
  }

  private getSession(): AgentSession {
    if (!this.session) {
      this.session = this.options.createSession();
      logger.log(AGENT, 'INFO', `Sesión del agente creada (driver ${this.session.driver}).`);
    }
    return this.session;
  }

  private async attempt(files: AgentFiles, correlationId?: string): Promise<GatewayOutcome> {
    let session: AgentSession;
    try {
      session = this.getSession();
    } catch (error) {
      return this.fail(null, 'ensureReady', errorMessage(error), correlationId);
    }

    const stages: Array<[StageName, () => Promise<StageResult>]> = [
      ['ensureReady', () => session.ensureReady()],
      ['submitPrompt', () => session.submitPrompt(this.prompt)],
      ['attachFiles', () => session.attachFiles([files.pdfPath, files.xmlPath])],
      ['send', () => session.send(this.prompt)],
    ];

    for (const [stage, run] of stages) {
      let result: StageResult;
      try {
        result = await run();
      } catch (error) {
        return this.fail(session, stage, errorMessage(error), correlationId);
      }
      if (result.status !== 'ready') {
        return this.fail(session, stage, `${result.status}: ${result.detail}`, correlationId);
      }
    }

    let rawText: string;
    try {
      rawText = await this.waitForAnswer(session);
    } catch (error) {
      return this.fail(session, 'readAnswer', errorMessage(error), correlationId);
    }

    const result = parseAgentAnswer(rawText);
    if (!result) {
      logger.log(AGENT, 'WARN', 'La respuesta del agente no contiene un JSON de clasificación.', { rawText }, {
        correlationId,
        scope: 'agent',
      });
      return { status: 'unparsable', rawText };
    }

    logger.log(AGENT, 'INFO', `Documento clasificado como ${result.documentType}.`, {
      appliedCategory: result.appliedCategory,
    }, { correlationId, scope: 'agent' });
    return { status: 'classified', result, rawText };
  }

  /**
   * Polls until a non-empty answer reads the same twice across the stabilization pause.
   * On timeout the last text read is returned, or {@link NO_ANSWER_TEXT}.
   */
  private async waitForAnswer(session: AgentSession): Promise<string> {
    const { answerTimeoutMs, stablePauseMs, pollIntervalMs } = this.options.timings;
    const deadline = Date.now() + answerTimeoutMs;
    let last = '';

    while (Date.now() < deadline) {
      const text = await session.readLatestAnswer();
      if (text && text !== last) {
        last = text;
        await delay(stablePauseMs);
        if ((await session.readLatestAnswer()) === last) {
          return last;
        }
      }
      await delay(pollIntervalMs);
    }
    return last || NO_ANSWER_TEXT;
  }

  private async fail(
    session: AgentSession | null,
    stage: StageName,
    reason: string,
    correlationId?: string,
  ): Promise<GatewayOutcome> {
    logger.log(AGENT, 'ERROR', `Falló la automatización del agente en ${stage}: ${reason}`, undefined, {
      correlationId,
      scope: 'agent',
    });

    if (!session) {
      return { status: 'failed', stage, reason };
    }

    try {
      const snapshot = await session.captureDiagnostics(stage);
      return snapshot ? { status: 'failed', stage, reason, snapshot } : { status: 'failed', stage, reason };
    } catch (error) {
      logger.log(AGENT, 'WARN', `No se pudo capturar el diagnóstico: ${errorMessage(error)}`, undefined, {
        correlationId,
        scope: 'agent',
      });
      return { status: 'failed', stage, reason };
    }
  }
}
