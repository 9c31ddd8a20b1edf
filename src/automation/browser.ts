import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { LOGIN_PATH, SEARCH_PATH } from './constants.js';
import { BackendResponse, BackendTransport } from './types.js';
import { NetworkFaultError, errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { SessionState } from '../services/sessionStore.js';

const logger = rootLogger.child('browser');

export interface BrowserOptions {
  baseUrl: string;
  headless?: boolean;
  navTimeoutMs?: number;
  viewport?: { width: number; height: number };
}

export interface RestartOptions {
  headless: boolean;
  state?: SessionState;
}

/**
 * A controllable browser that runs backend calls as page script.
 */
export interface BrowserBridge extends BackendTransport {
  restart(options: RestartOptions): Promise<void>;
  isHeadless(): boolean;
  openLoginPage(): Promise<void>;
  openSearchPage(): Promise<void>;
  exportState(): Promise<SessionState>;
  close(): Promise<void>;
}

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

interface FormRequest {
  endpoint: string;
  params: Record<string, string>;
}

export class PlaywrightBridge implements BrowserBridge {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private headless: boolean;
  private readonly baseUrl: string;
  private readonly navTimeoutMs: number;
  private readonly viewport: { width: number; height: number };

  constructor(options: BrowserOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.headless = options.headless ?? true;
    this.navTimeoutMs = options.navTimeoutMs ?? 30000;
    this.viewport = options.viewport ?? DEFAULT_VIEWPORT;
  }

  isHeadless(): boolean {
    return this.headless;
  }

  async start(state?: SessionState): Promise<void> {
    if (this.browser) {
      logger.warn('Browser instance already exists, closing it');
      await this.close();
    }

    logger.info('Launching browser', { headless: this.headless, restoredSession: Boolean(state) });

    try {
      this.browser = await chromium.launch({
        headless: this.headless,
        args: ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage', '--no-sandbox'],
      });

      this.context = await this.browser.newContext({
        viewport: this.viewport,
        userAgent: USER_AGENT,
        locale: 'ko-KR',
        timezoneId: 'Asia/Seoul',
        storageState: state,
      });

      // Hide the automation markers the backend fingerprints
      await this.context.addInitScript(() => {
        Object.defineProperty(navigator, 'webdriver', {
          get: () => undefined,
        });
        Object.defineProperty(navigator, 'languages', {
          get: () => ['ko-KR', 'ko', 'en-US', 'en'],
        });
      });

      this.page = await this.context.newPage();
      this.page.setDefaultTimeout(this.navTimeoutMs);
      this.page.setDefaultNavigationTimeout(this.navTimeoutMs);

      await this.openSearchPage();
    } catch (error) {
      logger.error('Failed to start browser', { error: errorMessage(error) });
      await this.close();
      throw error;
    }
  }

  async restart(options: RestartOptions): Promise<void> {
    await this.close();
    this.headless = options.headless;
    await this.start(options.state);
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Browser not started. Call start() first.');
    }
    return this.page;
  }

  private requireContext(): BrowserContext {
    if (!this.context) {
      throw new Error('Browser not started. Call start() first.');
    }
    return this.context;
  }

  async openLoginPage(): Promise<void> {
    await this.requirePage().goto(`${this.baseUrl}${LOGIN_PATH}`, { waitUntil: 'networkidle' });
  }

  async openSearchPage(): Promise<void> {
    await this.requirePage().goto(`${this.baseUrl}${SEARCH_PATH}`, { waitUntil: 'networkidle' });
  }

  async exportState(): Promise<SessionState> {
    return this.requireContext().storageState();
  }

  /**
   * POST a form from inside the page so the request carries the page's
   * cookies and script context.
   */
  async postForm(endpoint: string, params: Record<string, string>): Promise<BackendResponse> {
    const page = this.requirePage();
    try {
      return await page.evaluate(async ({ endpoint: path, params: fields }: FormRequest) => {
        const form = new FormData();
        for (const [key, value] of Object.entries(fields)) {
          form.append(key, value);
        }
        const response = await fetch(path, {
          method: 'POST',
          body: form,
          credentials: 'include',
        });
        return { ok: response.ok, status: response.status, text: await response.text() };
      }, { endpoint, params });
    } catch (error) {
      throw new NetworkFaultError(endpoint, errorMessage(error));
    }
  }

  async close(): Promise<void> {
    const { page, context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;

    await closeQuietly('page', page);
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
    if (browser) {
      logger.info('Browser closed');
    }
  }
}

async function closeQuietly(name: string, target: { close(): Promise<void> } | null): Promise<void> {
  if (!target) return;
  try {
    await target.close();
  } catch (error) {
    logger.warn(`Failed to close ${name}`, { error: errorMessage(error) });
  }
}
