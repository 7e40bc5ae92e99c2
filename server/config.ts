import os from 'node:os';
import path from 'node:path';
import type { AgentDriver } from '../agents/agentSession';
import { env, envBool, envNumber } from '../utils/env';

export interface ServerConfig {
  port: number;
  maxUploadBytes: number;
  driver: AgentDriver;
  browser: {
    targetUrl: string;
    userDataDir: string;
    profileDirectory: string;
    headless: boolean;
    executablePath: string;
    selectorsPath?: string;
  };
  gemini: {
    apiKey: string;
    model: string;
  };
  gateway: {
    maxQueued: number;
    stageTimeoutMs: number;
    answerTimeoutMs: number;
    stablePauseMs: number;
    pollIntervalMs: number;
  };
  snapshotDir: string;
}

const parseDriver = (value: string): AgentDriver => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'browser' || normalized === 'api') {
    return normalized;
  }
  throw new Error(`AGENT_DRIVER inválido: '${value}' (use 'browser' o 'api')`);
};

export function loadServerConfig(): ServerConfig {
  return {
    port: envNumber('PORT', 8000),
    maxUploadBytes: envNumber('MAX_UPLOAD_BYTES', 20 * 1024 * 1024),
    driver: parseDriver(env('AGENT_DRIVER', 'browser')),
    browser: {
      targetUrl: env('GEMINI_URL', 'https://gemini.google.com/app?hl=es'),
      userDataDir: env('GEMINI_USER_DATA', path.join(os.homedir(), 'ChromeAutomation', 'GeminiProfile')),
      profileDirectory: env('GEMINI_PROFILE_DIR', 'Default'),
      headless: envBool('GEMINI_HEADLESS', false),
      executablePath: env('CHROME_EXECUTABLE_PATH', '/usr/bin/google-chrome'),
      selectorsPath: env('AGENT_SELECTORS_PATH') || undefined,
    },
    gemini: {
      apiKey: env('GEMINI_API_KEY'),
      model: env('GEMINI_MODEL', 'gemini-2.5-flash'),
    },
    gateway: {
      maxQueued: envNumber('AGENT_MAX_QUEUE', 8),
      stageTimeoutMs: envNumber('AGENT_STAGE_TIMEOUT_MS', 18000),
      answerTimeoutMs: envNumber('AGENT_ANSWER_TIMEOUT_MS', 90000),
      stablePauseMs: envNumber('AGENT_STABLE_PAUSE_MS', 600),
      pollIntervalMs: envNumber('AGENT_POLL_INTERVAL_MS', 300),
    },
    snapshotDir: path.resolve(env('DEBUG_SNAPSHOT_DIR', 'debug_snapshots')),
  };
}
