import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import dayjs from 'dayjs';
import puppeteer, { BrowserEvent, TimeoutError, type Browser, type ElementHandle, type Page } from 'puppeteer-core';
import { logger } from '../services/logger';
import type { DiagnosticSnapshot, StageResult } from '../types';
import { notFound, ready, timedOut, type AgentSession } from './agentSession';
import type { SelectorCatalog } from './selectorCatalog';

export interface BrowserSessionConfig {
  targetUrl: string;
  userDataDir: string;
  profileDirectory: string;
  headless: boolean;
  executablePath: string;
  stageTimeoutMs: number;
  snapshotDir: string;
  selectors: SelectorCatalog;
}

const AGENT = 'BrowserAgentSession';
const LOOKUP_INTERVAL_MS = 200;
const SETTLE_MS = 150;
const INTERSTITIAL_TIMEOUT_MS = 5000;
const NEW_CHAT_TIMEOUT_MS = 3000;
const SEND_BUTTON_TIMEOUT_MS = 5000;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Drives the agent's web UI through a persistent Chrome profile. The browser is launched on the
 * first stage and the same tab is reused by every later attempt.
 */
export class BrowserAgentSession implements AgentSession {
  readonly driver = 'browser' as const;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private page: Page | null = null;

  constructor(private readonly config: BrowserSessionConfig) {}

  async ensureReady(): Promise<StageResult> {
    const page = await this.getPage();
    const { targetUrl, stageTimeoutMs, selectors } = this.config;

    if (!page.url().startsWith(new URL(targetUrl).origin)) {
      try {
        await page.goto(targetUrl, { waitUntil: 'domcontentloaded', timeout: stageTimeoutMs });
      } catch (error) {
        if (error instanceof TimeoutError) {
          return timedOut(`la página ${targetUrl} no cargó en ${stageTimeoutMs}ms`);
        }
        throw error;
      }
      await this.clickFirst(selectors.interstitials, INTERSTITIAL_TIMEOUT_MS);
    }

    // staying in the current conversation is acceptable when there is no new-chat control
    await this.clickFirst(selectors.newChat, NEW_CHAT_TIMEOUT_MS);

    const composer = await this.findFirst(selectors.composer, stageTimeoutMs);
    if (!composer) {
      return timedOut('el cuadro de texto del agente no apareció');
    }
    await setEditableText(composer, '');
    await composer.dispose();
    return ready();
  }

  async submitPrompt(prompt: string): Promise<StageResult> {
    const composer = await this.findFirst(this.config.selectors.composer, this.config.stageTimeoutMs);
    if (!composer) {
      return notFound('cuadro de texto del agente');
    }
    await setEditableText(composer, prompt);
    await composer.dispose();
    return ready();
  }

  async attachFiles(paths: string[]): Promise<StageResult> {
    const page = await this.getPage();
    const { selectors, stageTimeoutMs } = this.config;
    const absolute = paths.map((file) => path.resolve(file));

    if (!(await this.clickFirst(selectors.uploadMenu, stageTimeoutMs))) {
      return notFound('botón para adjuntar archivos');
    }

    const item = await this.findFirst(selectors.uploadItem, INTERSTITIAL_TIMEOUT_MS);
    const attached = item ? await this.acceptThroughChooser(page, item, absolute) : false;

    if (!attached) {
      await page.keyboard.press('Escape');
      const input = await this.findFirst(selectors.fileInput, stageTimeoutMs, { visible: false });
      if (!input) {
        return notFound('input[type=file] tras abrir el menú de subida');
      }
      const fileInput = await input.toElement('input');
      await fileInput.uploadFile(...absolute);
      await fileInput.dispose();
    }

    // the attachment preview is not guaranteed to render; its absence is not a failure
    const chip = await this.findFirst(selectors.attachmentChip, stageTimeoutMs);
    if (!chip) {
      logger.log(AGENT, 'WARN', 'No se observó la vista previa de los adjuntos.');
    }
    await chip?.dispose();
    return ready();
  }

  async send(prompt: string): Promise<StageResult> {
    const page = await this.getPage();
    const composer = await this.findFirst(this.config.selectors.composer, this.config.stageTimeoutMs);
    if (!composer) {
      return notFound('cuadro de texto del agente');
    }
    await setEditableText(composer, `${prompt} `);
    await composer.dispose();

    if (!(await this.clickFirst(this.config.selectors.sendButton, SEND_BUTTON_TIMEOUT_MS))) {
      await page.keyboard.down('Control');
      await page.keyboard.press('Enter');
      await page.keyboard.up('Control');
    }
    return ready();
  }

  async readLatestAnswer(): Promise<string> {
    const page = await this.getPage();
    for (const selector of this.config.selectors.answer) {
      const handles = await page.$$(selector);
      const last = handles.at(-1);
      const text = last
        ? await last.evaluate((el) => (el instanceof HTMLElement ? el.innerText : el.textContent ?? ''))
        : '';
      await Promise.all(handles.map((handle) => handle.dispose()));
      if (text.trim()) {
        return text.trim();
      }
    }
    return '';
  }

  async captureDiagnostics(label: string): Promise<DiagnosticSnapshot | null> {
    const page = this.page;
    if (!page || page.isClosed()) {
      return null;
    }
    await mkdir(this.config.snapshotDir, { recursive: true });
    const base = path.join(this.config.snapshotDir, `${dayjs().format('YYYYMMDD-HHmmss-SSS')}-${label}`);
    const screenshotPath = `${base}.png`;
    const markupPath = `${base}.html`;
    await writeFile(screenshotPath, await page.screenshot({ fullPage: true }));
    await writeFile(markupPath, await page.content(), 'utf8');
    logger.log(AGENT, 'INFO', `Diagnóstico guardado en ${base}.*`);
    return { screenshotPath, markupPath };
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (browser?.connected) {
      await browser.close();
    }
  }

  private async getBrowser(): Promise<Browser> {
    if (this.browser?.connected) {
      return this.browser;
    }
    if (this.launching) {
      return this.launching;
    }

    const { executablePath, headless, userDataDir, profileDirectory } = this.config;
    this.launching = puppeteer.launch({
      executablePath,
      headless,
      userDataDir,
      defaultViewport: { width: 1920, height: 1080 },
      args: [
        '--window-size=1920,1080',
        '--no-first-run',
        '--no-default-browser-check',
        '--disable-dev-shm-usage',
        '--disable-popup-blocking',
        ...(profileDirectory ? [`--profile-directory=${profileDirectory}`] : []),
      ],
    });

    try {
      const browser = await this.launching;
      browser.on(BrowserEvent.Disconnected, () => {
        logger.log(AGENT, 'WARN', 'El navegador se desconectó; se relanzará en el próximo intento.');
        this.browser = null;
        this.page = null;
      });
      this.browser = browser;
      logger.log(AGENT, 'INFO', `Navegador iniciado con el perfil ${userDataDir} (${profileDirectory}).`);
      return browser;
    } finally {
      this.launching = null;
    }
  }

  private async getPage(): Promise<Page> {
    if (this.page && !this.page.isClosed()) {
      return this.page;
    }
    const browser = await this.getBrowser();
    const [existing] = await browser.pages();
    const page = existing ?? (await browser.newPage());
    page.setDefaultTimeout(this.config.stageTimeoutMs);
    this.page = page;
    return page;
  }

  /** First element matching any of the selectors, polled until `timeoutMs`; null on timeout. */
  private async findFirst(
    selectors: string[],
    timeoutMs: number,
    { visible = true }: { visible?: boolean } = {},
  ): Promise<ElementHandle<Element> | null> {
    const page = await this.getPage();
    const deadline = Date.now() + timeoutMs;
    do {
      for (const selector of selectors) {
        const handle = await page.$(selector);
        if (handle && (!visible || (await handle.isVisible()))) {
          return handle;
        }
        await handle?.dispose();
      }
      await delay(LOOKUP_INTERVAL_MS);
    } while (Date.now() < deadline);
    return null;
  }

  private async clickFirst(selectors: string[], timeoutMs: number): Promise<boolean> {
    const handle = await this.findFirst(selectors, timeoutMs);
    if (!handle) {
      return false;
    }
    try {
      await handle.click();
    } catch {
      // an overlay intercepted the pointer; a DOM click still reaches the control
      await handle.evaluate((el) => {
        if (el instanceof HTMLElement) el.click();
      });
    } finally {
      await handle.dispose();
    }
    await delay(SETTLE_MS);
    return true;
  }

  private async acceptThroughChooser(page: Page, item: ElementHandle<Element>, paths: string[]): Promise<boolean> {
    try {
      const [chooser] = await Promise.all([
        page.waitForFileChooser({ timeout: this.config.stageTimeoutMs }),
        item.click(),
      ]);
      await chooser.accept(paths);
      return true;
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      logger.log(AGENT, 'WARN', 'El menú de subida no abrió un selector de archivos; se usa el input directo.');
      return false;
    } finally {
      await item.dispose();
    }
  }
}

async function setEditableText(handle: ElementHandle<Element>, text: string): Promise<void> {
  await handle.evaluate((el, value) => {
    if (!(el instanceof HTMLElement)) return;
    el.focus();
    el.innerText = value;
    el.dispatchEvent(new InputEvent('input', { bubbles: true }));
    el.dispatchEvent(new Event('change', { bubbles: true }));
  }, text);
}
