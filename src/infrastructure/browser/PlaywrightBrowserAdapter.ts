import { chromium, Browser, BrowserContext, Locator, Page } from 'playwright';
import {
  ActionResult,
  BrowserPort,
  ClickOptions,
  NavigateOptions,
} from '../../application/ports/BrowserPort';
import { ElementHandle } from '../../application/ports/PageQueryPort';
import { errorMessage } from '../../domain/errors/AppErrors';
import { getLogger } from '../logging';
import { PlaywrightElementHandle } from './PlaywrightElementHandle';

/**
 * Configuration for the PlaywrightBrowserAdapter.
 */
export interface PlaywrightBrowserConfig {
  /** Run browser in headless mode */
  headless?: boolean;
  /** Default timeout for actions in milliseconds */
  timeout?: number;
  /** Viewport width */
  viewportWidth?: number;
  /** Viewport height */
  viewportHeight?: number;
  /** Maximum navigation attempts */
  maxRetries?: number;
  /** Base delay for exponential backoff in milliseconds */
  retryBaseDelay?: number;
}

const DEFAULT_CONFIG: Required<PlaywrightBrowserConfig> = {
  headless: true,
  timeout: 30000,
  viewportWidth: 1280,
  viewportHeight: 720,
  maxRetries: 3,
  retryBaseDelay: 1000,
};

const TYPE_DELAY_MS = 50;

const logger = getLogger('Browser');

/**
 * Playwright implementation of the BrowserPort interface.
 * Launches a fresh, non-persistent Chromium context per instance.
 */
export class PlaywrightBrowserAdapter implements BrowserPort {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private config: Required<PlaywrightBrowserConfig>;

  constructor(config: PlaywrightBrowserConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async initialize(): Promise<void> {
    this.browser = await chromium.launch({
      headless: this.config.headless,
    });

    this.context = await this.browser.newContext({
      viewport: {
        width: this.config.viewportWidth,
        height: this.config.viewportHeight,
      },
    });

    this.page = await this.context.newPage();
    this.page.setDefaultTimeout(this.config.timeout);

    logger.info('Browser ready', {
      headless: this.config.headless,
      viewport: `${this.config.viewportWidth}x${this.config.viewportHeight}`,
    });
  }

  async close(): Promise<void> {
    if (this.page) {
      await this.page.close();
      this.page = null;
    }
    if (this.context) {
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  isReady(): boolean {
    return this.browser !== null && this.page !== null;
  }

  /**
   * The live page. Throws before initialize().
   */
  getPage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    return this.page;
  }

  /**
   * Executes an action with retry logic and exponential backoff.
   */
  private async withRetry(action: () => Promise<void>, actionName: string): Promise<ActionResult> {
    const startTime = Date.now();
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      try {
        await action();
        return { success: true, duration: Date.now() - startTime };
      } catch (error) {
        lastError = error;
        logger.debug(`${actionName} attempt failed`, { attempt, error: errorMessage(error) });

        if (attempt < this.config.maxRetries) {
          await this.sleep(this.config.retryBaseDelay * Math.pow(2, attempt - 1));
        }
      }
    }

    return {
      success: false,
      error: `${actionName} failed after ${this.config.maxRetries} attempts: ${errorMessage(lastError)}`,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Runs one attempt of an action and reports the outcome.
   */
  private async once(action: () => Promise<void>, actionName: string): Promise<ActionResult> {
    const startTime = Date.now();
    try {
      await action();
      return { success: true, duration: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        error: `${actionName} failed: ${errorMessage(error)}`,
        duration: Date.now() - startTime,
      };
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private locatorOf(handle: ElementHandle): Locator {
    if (!(handle instanceof PlaywrightElementHandle)) {
      throw new Error(`Handle ${handle.label} was not created by this browser`);
    }
    return handle.locator;
  }

  async navigate(url: string, options: NavigateOptions = {}): Promise<ActionResult> {
    const page = this.getPage();

    return this.withRetry(async () => {
      await page.goto(url, {
        waitUntil: options.waitUntil ?? 'domcontentloaded',
        timeout: options.timeout ?? this.config.timeout,
      });
    }, 'Navigate');
  }

  click(handle: ElementHandle, options: ClickOptions = {}): Promise<ActionResult> {
    return this.once(async () => {
      await this.locatorOf(handle).click({
        force: options.force,
        timeout: options.timeout ?? this.config.timeout,
      });
    }, 'Click');
  }

  fill(handle: ElementHandle, value: string): Promise<ActionResult> {
    return this.once(async () => {
      await this.locatorOf(handle).fill(value, { timeout: this.config.timeout });
    }, 'Fill');
  }

  hover(handle: ElementHandle): Promise<ActionResult> {
    return this.once(async () => {
      await this.locatorOf(handle).hover({ timeout: this.config.timeout });
    }, 'Hover');
  }

  pressKey(key: string): Promise<ActionResult> {
    return this.once(async () => {
      await this.getPage().keyboard.press(key);
    }, 'PressKey');
  }

  typeText(text: string): Promise<ActionResult> {
    return this.once(async () => {
      await this.getPage().keyboard.type(text, { delay: TYPE_DELAY_MS });
    }, 'Type');
  }

  async wait(ms: number): Promise<void> {
    await this.getPage().waitForTimeout(ms);
  }

  /**
   * Network idle is best effort: pages with long polling never reach it.
   */
  async waitForStability(timeoutMs: number): Promise<void> {
    try {
      await this.getPage().waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch (error) {
      logger.debug('Network did not go idle', { timeoutMs, error: errorMessage(error) });
    }
  }

  async getCurrentUrl(): Promise<string> {
    return this.getPage().url();
  }
}
