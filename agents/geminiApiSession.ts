import { readFile } from 'node:fs/promises';
import { GoogleGenAI, type Part } from '@google/genai';
import { logger } from '../services/logger';
import type { DiagnosticSnapshot, StageResult } from '../types';
import { notFound, ready, timedOut, type AgentSession } from './agentSession';

export interface GeminiApiSessionConfig {
  apiKey: string;
  model: string;
  stageTimeoutMs: number;
}

// attachFiles always receives the PDF first and the XML second
const ATTACHMENT_TYPES = ['application/pdf', 'text/xml'] as const;

/** Resolves to null when `promise` has not settled within `ms`. */
async function withinTimeout<T>(promise: Promise<T>, ms: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * The same agent reached through the Gemini SDK instead of its web UI. Stages build up one
 * request; `send` issues it and the answer is then read back from memory.
 */
export class GeminiApiSession implements AgentSession {
  readonly driver = 'api' as const;
  private client: GoogleGenAI | null = null;
  private prompt = '';
  private attachments: Part[] = [];
  private answer = '';

  constructor(private readonly config: GeminiApiSessionConfig) {}

  async ensureReady(): Promise<StageResult> {
    if (!this.config.apiKey) {
      throw new Error('GEMINI_API_KEY no está configurada');
    }
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.config.apiKey });
    }
    this.prompt = '';
    this.attachments = [];
    this.answer = '';
    return ready();
  }

  async submitPrompt(prompt: string): Promise<StageResult> {
    this.prompt = prompt;
    return ready();
  }

  async attachFiles(paths: string[]): Promise<StageResult> {
    if (paths.length !== ATTACHMENT_TYPES.length) {
      return notFound(`se esperaban ${ATTACHMENT_TYPES.length} archivos (PDF y XML), se recibieron ${paths.length}`);
    }
    const parts: Part[] = [];
    for (const [index, file] of paths.entries()) {
      const bytes = await readFile(file);
      parts.push({ inlineData: { mimeType: ATTACHMENT_TYPES[index], data: bytes.toString('base64') } });
    }
    this.attachments = parts;
    return ready();
  }

  async send(prompt: string): Promise<StageResult> {
    if (!this.client) {
      return notFound('cliente Gemini sin inicializar');
    }
    this.prompt = prompt;
    const { model, stageTimeoutMs } = this.config;
    const request = this.client.models.generateContent({
      model,
      contents: [{ role: 'user', parts: [{ text: this.prompt }, ...this.attachments] }],
      config: { responseMimeType: 'application/json' },
    });
    const response = await withinTimeout(request, stageTimeoutMs);
    if (!response) {
      void request.catch((error: unknown) => {
        logger.log('GeminiApiSession', 'WARN', 'La solicitud abandonada a Gemini falló.', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return timedOut(`${model} no respondió en ${stageTimeoutMs}ms`);
    }
    this.answer = response.text ?? '';
    return ready();
  }

  async readLatestAnswer(): Promise<string> {
    return this.answer;
  }

  async captureDiagnostics(): Promise<DiagnosticSnapshot | null> {
    // there is no rendered page to capture
    return null;
  }

  async close(): Promise<void> {
    this.client = null;
  }
}
