import type { AgentSession } from '../agentSession';
import { ClassifierGateway, type GatewayTimings } from '../classifierGateway';
import { SessionBusyError } from '../../services/sessionLock';
import { telemetry } from '../../services/telemetry';
import { telemetryConfig } from '../../telemetry/config';
import type { DiagnosticSnapshot, StageResult } from '../../types';

const FILES = { pdfPath: '/tmp/doc.pdf', xmlPath: '/tmp/doc.xml' };
const ANSWER = '{"documentType":"Invoice","appliedCategory":"FEV_procesadas"}';

const FAST: GatewayTimings = { answerTimeoutMs: 200, stablePauseMs: 5, pollIntervalMs: 5 };

class FakeSession implements AgentSession {
  readonly driver = 'browser' as const;
  readonly calls: string[] = [];
  answers: string[] = [ANSWER];
  stageResults: Partial<Record<'ensureReady' | 'submitPrompt' | 'attachFiles' | 'send', StageResult>> = {};
  throwOn: string | null = null;
  snapshot: DiagnosticSnapshot | null = { screenshotPath: '/tmp/shot.png', markupPath: '/tmp/page.html' };
  closed = false;
  private reads = 0;

  private stage(name: 'ensureReady' | 'submitPrompt' | 'attachFiles' | 'send'): StageResult {
    this.calls.push(name);
    if (this.throwOn === name) {
      throw new Error(`${name} exploded`);
    }
    return this.stageResults[name] ?? { status: 'ready' };
  }

  async ensureReady() {
    this.reads = 0;
    return this.stage('ensureReady');
  }

  async submitPrompt() {
    return this.stage('submitPrompt');
  }

  async attachFiles(paths: string[]) {
    this.calls.push(`files:${paths.join(',')}`);
    return this.stage('attachFiles');
  }

  async send() {
    return this.stage('send');
  }

  async readLatestAnswer() {
    const answer = this.answers[Math.min(this.reads, this.answers.length - 1)];
    this.reads += 1;
    return answer;
  }

  async captureDiagnostics(label: string) {
    this.calls.push(`snapshot:${label}`);
    return this.snapshot;
  }

  async close() {
    this.closed = true;
  }
}

const createGateway = (session: AgentSession, overrides: Partial<{ maxQueued: number; timings: GatewayTimings }> = {}) =>
  new ClassifierGateway({
    createSession: () => session,
    maxQueued: overrides.maxQueued ?? 8,
    timings: overrides.timings ?? FAST,
  });

describe('ClassifierGateway', () => {
  it('runs the stages in order and returns the parsed classification', async () => {
    const session = new FakeSession();
    const outcome = await createGateway(session).classify(FILES);

    expect(session.calls).toEqual([
      'ensureReady',
      'submitPrompt',
      'files:/tmp/doc.pdf,/tmp/doc.xml',
      'attachFiles',
      'send',
    ]);
    expect(outcome).toEqual({
      status: 'classified',
      rawText: ANSWER,
      result: { documentType: 'Invoice', appliedCategory: 'FEV_procesadas', rawAgentText: ANSWER },
    });
  });

  it('creates the session once and reuses it across attempts', async () => {
    const session = new FakeSession();
    const createSession = jest.fn(() => session);
    const gateway = new ClassifierGateway({ createSession, maxQueued: 8, timings: FAST });

    await gateway.classify(FILES);
    await gateway.classify(FILES);

    expect(createSession).toHaveBeenCalledTimes(1);
    expect(session.calls.filter((call) => call === 'ensureReady')).toHaveLength(2);
  });

  it('waits for the answer to stop changing', async () => {
    const session = new FakeSession();
    session.answers = ['', '', '{"documentType":', ANSWER, ANSWER];

    const outcome = await createGateway(session).classify(FILES);

    expect(outcome.status).toBe('classified');
  });

  it('returns the partial text as unparsable when the answer never stabilizes', async () => {
    const session = new FakeSession();
    let counter = 0;
    session.readLatestAnswer = async () => `escribiendo ${counter++}`;

    const outcome = await createGateway(session, {
      timings: { answerTimeoutMs: 60, stablePauseMs: 5, pollIntervalMs: 5 },
    }).classify(FILES);

    expect(outcome.status).toBe('unparsable');
    expect(outcome.status === 'unparsable' && outcome.rawText.startsWith('escribiendo ')).toBe(true);
  });

  it('reports "(no answer read)" when nothing ever appears', async () => {
    const session = new FakeSession();
    session.answers = [''];

    const outcome = await createGateway(session, {
      timings: { answerTimeoutMs: 40, stablePauseMs: 5, pollIntervalMs: 5 },
    }).classify(FILES);

    expect(outcome).toEqual({ status: 'unparsable', rawText: '(no answer read)' });
  });

  it('treats an answer without the expected keys as unparsable', async () => {
    const session = new FakeSession();
    session.answers = ['No puedo abrir los archivos.'];

    const outcome = await createGateway(session).classify(FILES);

    expect(outcome).toEqual({ status: 'unparsable', rawText: 'No puedo abrir los archivos.' });
  });

  it('stops at the first stage that is not ready and captures a snapshot', async () => {
    const session = new FakeSession();
    session.stageResults.attachFiles = { status: 'not_found', detail: 'botón para adjuntar archivos' };

    const outcome = await createGateway(session).classify(FILES);

    expect(outcome).toEqual({
      status: 'failed',
      stage: 'attachFiles',
      reason: 'not_found: botón para adjuntar archivos',
      snapshot: { screenshotPath: '/tmp/shot.png', markupPath: '/tmp/page.html' },
    });
    expect(session.calls).not.toContain('send');
    expect(session.calls.at(-1)).toBe('snapshot:attachFiles');
  });

  it('turns a session exception into a failed outcome', async () => {
    const session = new FakeSession();
    session.throwOn = 'ensureReady';
    session.snapshot = null;

    const outcome = await createGateway(session).classify(FILES);

    expect(outcome).toEqual({ status: 'failed', stage: 'ensureReady', reason: 'ensureReady exploded' });
  });

  it('still fails cleanly when the snapshot itself throws', async () => {
    const session = new FakeSession();
    session.stageResults.send = { status: 'timed_out', detail: 'botón de envío' };
    session.captureDiagnostics = async () => {
      throw new Error('page closed');
    };

    const outcome = await createGateway(session).classify(FILES);

    expect(outcome).toEqual({ status: 'failed', stage: 'send', reason: 'timed_out: botón de envío' });
  });

  it('fails at ensureReady when the session cannot be created', async () => {
    const gateway = new ClassifierGateway({
      createSession: () => {
        throw new Error('GEMINI_API_KEY no está configurada');
      },
      maxQueued: 8,
      timings: FAST,
    });

    await expect(gateway.classify(FILES)).resolves.toEqual({
      status: 'failed',
      stage: 'ensureReady',
      reason: 'GEMINI_API_KEY no está configurada',
    });
  });

  it('never lets two attempts overlap', async () => {
    const finished: string[] = [];
    const session = new FakeSession();
    const originalReady = session.ensureReady.bind(session);
    let active = 0;
    let maxActive = 0;
    session.ensureReady = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      return originalReady();
    };
    session.send = async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      active -= 1;
      return { status: 'ready' };
    };

    const gateway = createGateway(session);
    const track = (label: string) =>
      gateway.classify(FILES).then((outcome) => {
        finished.push(label);
        return outcome;
      });

    const outcomes = await Promise.all([track('first'), track('second'), track('third')]);

    expect(maxActive).toBe(1);
    expect(outcomes.every((outcome) => outcome.status === 'classified')).toBe(true);
    expect(finished).toEqual(['first', 'second', 'third']);
  });

  it('rejects callers beyond the queue bound with SessionBusyError', async () => {
    const session = new FakeSession();
    const pendingSends: Array<() => void> = [];
    session.send = () =>
      new Promise<StageResult>((resolve) => {
        pendingSends.push(() => resolve({ status: 'ready' }));
      });
    const releaseNextSend = async () => {
      while (pendingSends.length === 0) {
        await new Promise((resolve) => setTimeout(resolve, 1));
      }
      pendingSends.shift()?.();
    };

    const gateway = createGateway(session, { maxQueued: 1 });
    const running = gateway.classify(FILES);
    const queued = gateway.classify(FILES);

    await expect(gateway.classify(FILES)).rejects.toBeInstanceOf(SessionBusyError);
    expect(gateway.queueDepth).toBe(1);

    await releaseNextSend();
    await expect(running).resolves.toMatchObject({ status: 'classified' });
    await releaseNextSend();
    await expect(queued).resolves.toMatchObject({ status: 'classified' });
  });

  it('warms up and shuts the session down', async () => {
    const session = new FakeSession();
    const gateway = createGateway(session);

    await expect(gateway.warmUp()).resolves.toEqual({ status: 'ready' });
    await gateway.shutdown();

    expect(session.calls).toEqual(['ensureReady']);
    expect(session.closed).toBe(true);
  });

  describe('failure alerts', () => {
    const { slack } = telemetryConfig.alertWebhooks;
    const threshold = telemetryConfig.thresholds.agent.consecutiveFailures;

    afterEach(() => {
      telemetryConfig.alertWebhooks.slack = slack;
      telemetryConfig.thresholds.agent.consecutiveFailures = threshold;
      telemetry.recordOutcome('agent', true);
      jest.restoreAllMocks();
    });

    it('releases the session while an alert webhook is still pending', async () => {
      telemetryConfig.alertWebhooks.slack = 'https://hooks.example.test/alerts';
      telemetryConfig.thresholds.agent.consecutiveFailures = 1;
      telemetry.recordOutcome('agent', true);
      const fetchMock = jest.spyOn(global, 'fetch').mockImplementation(() => new Promise<Response>(() => undefined));

      const session = new FakeSession();
      session.stageResults.send = { status: 'timed_out', detail: 'botón de envío' };
      const gateway = createGateway(session, { maxQueued: 0 });

      await expect(gateway.classify(FILES)).resolves.toMatchObject({ status: 'failed', stage: 'send' });
      expect(fetchMock).toHaveBeenCalledWith(
        'https://hooks.example.test/alerts',
        expect.objectContaining({ method: 'POST' }),
      );
      expect(gateway.busy).toBe(false);

      session.stageResults.send = undefined;
      await expect(gateway.classify(FILES)).resolves.toMatchObject({ status: 'classified' });
    });
  });
});
