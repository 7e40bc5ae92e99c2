import type { DiagnosticSnapshot, StageResult } from '../types';

export type AgentDriver = 'browser' | 'api';

/**
 * One long-lived conversation with the external agent. Every interaction stage reports a
 * {@link StageResult} instead of throwing; thrown errors are reserved for faults of the
 * session itself (browser crash, missing credentials).
 */
export interface AgentSession {
  readonly driver: AgentDriver;
  /** Reaches the ready interaction surface and clears input left over from a previous attempt. */
  ensureReady(): Promise<StageResult>;
  submitPrompt(prompt: string): Promise<StageResult>;
  /** Receives the PDF path first and the XML path second. */
  attachFiles(paths: string[]): Promise<StageResult>;
  /** Re-enters the prompt (the composer may have been rebuilt by the attach step) and submits. */
  send(prompt: string): Promise<StageResult>;
  /** Latest answer text visible in the conversation, or '' when there is none yet. */
  readLatestAnswer(): Promise<string>;
  captureDiagnostics(label: string): Promise<DiagnosticSnapshot | null>;
  close(): Promise<void>;
}

export const ready = (): StageResult => ({ status: 'ready' });
export const notFound = (detail: string): StageResult => ({ status: 'not_found', detail });
export const timedOut = (detail: string): StageResult => ({ status: 'timed_out', detail });
