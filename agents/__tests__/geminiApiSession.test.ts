import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: {
      generateContent: mockGenerateContent,
    },
  })),
}));

import { GoogleGenAI } from '@google/genai';
import { GeminiApiSession } from '../geminiApiSession';

const CONFIG = { apiKey: 'test-key', model: 'gemini-test', stageTimeoutMs: 1000 };

describe('GeminiApiSession', () => {
  let dir: string;
  let pdfPath: string;
  let xmlPath: string;

  beforeEach(() => {
    mockGenerateContent.mockReset();
    jest.mocked(GoogleGenAI).mockClear();
    dir = mkdtempSync(path.join(os.tmpdir(), 'api-session-'));
    pdfPath = path.join(dir, 'factura.pdf');
    xmlPath = path.join(dir, 'factura.xml');
    writeFileSync(pdfPath, '%PDF-1.4');
    writeFileSync(xmlPath, '<Invoice/>');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('sends the prompt and both files inline in one request', async () => {
    mockGenerateContent.mockResolvedValue({ text: '{"documentType":"Invoice","appliedCategory":"FEV_procesadas"}' });
    const session = new GeminiApiSession(CONFIG);

    await expect(session.ensureReady()).resolves.toEqual({ status: 'ready' });
    await session.submitPrompt('clasifica');
    await expect(session.attachFiles([pdfPath, xmlPath])).resolves.toEqual({ status: 'ready' });
    await expect(session.send('clasifica')).resolves.toEqual({ status: 'ready' });

    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-test',
      contents: [
        {
          role: 'user',
          parts: [
            { text: 'clasifica' },
            { inlineData: { mimeType: 'application/pdf', data: Buffer.from('%PDF-1.4').toString('base64') } },
            { inlineData: { mimeType: 'text/xml', data: Buffer.from('<Invoice/>').toString('base64') } },
          ],
        },
      ],
      config: { responseMimeType: 'application/json' },
    });
    await expect(session.readLatestAnswer()).resolves.toBe(
      '{"documentType":"Invoice","appliedCategory":"FEV_procesadas"}',
    );
  });

  it('clears the previous answer when a new attempt starts', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'primera' });
    const session = new GeminiApiSession(CONFIG);

    await session.ensureReady();
    await session.send('p');
    await session.ensureReady();

    await expect(session.readLatestAnswer()).resolves.toBe('');
    expect(GoogleGenAI).toHaveBeenCalledTimes(1);
  });

  it('refuses to start without an API key', async () => {
    const session = new GeminiApiSession({ ...CONFIG, apiKey: '' });

    await expect(session.ensureReady()).rejects.toThrow('GEMINI_API_KEY no está configurada');
  });

  it('types attachments by position, whatever their names', async () => {
    const pdfNoExtension = path.join(dir, 'factura_pdf');
    const xmlNoExtension = path.join(dir, 'factura_xml');
    writeFileSync(pdfNoExtension, '%PDF-1.4');
    writeFileSync(xmlNoExtension, '<Invoice/>');
    mockGenerateContent.mockResolvedValue({ text: '{}' });
    const session = new GeminiApiSession(CONFIG);
    await session.ensureReady();

    await expect(session.attachFiles([pdfNoExtension, xmlNoExtension])).resolves.toEqual({ status: 'ready' });
    await session.send('clasifica');

    const [request] = mockGenerateContent.mock.calls[0];
    expect(request.contents[0].parts.slice(1)).toEqual([
      { inlineData: { mimeType: 'application/pdf', data: Buffer.from('%PDF-1.4').toString('base64') } },
      { inlineData: { mimeType: 'text/xml', data: Buffer.from('<Invoice/>').toString('base64') } },
    ]);
  });

  it('expects exactly one PDF and one XML', async () => {
    const session = new GeminiApiSession(CONFIG);
    await session.ensureReady();

    await expect(session.attachFiles([pdfPath])).resolves.toEqual({
      status: 'not_found',
      detail: 'se esperaban 2 archivos (PDF y XML), se recibieron 1',
    });
  });

  it('times out a request that never answers', async () => {
    mockGenerateContent.mockReturnValue(new Promise(() => undefined));
    const session = new GeminiApiSession({ ...CONFIG, stageTimeoutMs: 20 });
    await session.ensureReady();
    await session.attachFiles([pdfPath, xmlPath]);

    await expect(session.send('clasifica')).resolves.toEqual({
      status: 'timed_out',
      detail: 'gemini-test no respondió en 20ms',
    });
    await expect(session.readLatestAnswer()).resolves.toBe('');
  });

  it('has no page to capture', async () => {
    const session = new GeminiApiSession(CONFIG);

    await expect(session.captureDiagnostics()).resolves.toBeNull();
  });
});
