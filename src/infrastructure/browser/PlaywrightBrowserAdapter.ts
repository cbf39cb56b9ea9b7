import { chromium, Browser, BrowserContext, Locator, Page } from 'playwright';
import { ReplayBrowserPort } from '../../application/ports/ReplayBrowserPort';
import { DomEventName } from '../../domain/dom/DomEvent';
import { Transition, TransitionOptions } from '../../domain/dom/Transition';
import { ElementNotFoundError, NavigationError } from '../../domain/errors/AppErrors';
import { BrowserConfig } from '../config/ConfigSchema';
import { loggers } from '../logging';

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
  /** Maximum attempts for a failed dispatch or navigation */
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

/**
 * An element resolved from its stored identifier (a CSS selector).
 */
export interface LocatedElement {
  identifier: string;
  locator: Locator;
}

/**
 * Playwright implementation of the browser used to record and replay
 * transitions. Every navigation and every fired event yields a completed
 * Transition.
 */
export class PlaywrightBrowserAdapter implements ReplayBrowserPort<LocatedElement> {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private config: Required<PlaywrightBrowserConfig>;

  constructor(config: PlaywrightBrowserConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  static fromConfig(config: BrowserConfig): PlaywrightBrowserAdapter {
    return new PlaywrightBrowserAdapter({
      headless: config.headless,
      timeout: config.timeout,
      viewportWidth: config.width,
      viewportHeight: config.height,
      maxRetries: config.maxRetries,
      retryBaseDelay: config.retryBaseDelay,
    });
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
   * Runs an action with retries and exponential backoff.
   */
  private async withRetry(
    action: () => Promise<void>,
    actionName: string
  ): Promise<{ error: string | null; attempts: number }> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      try {
        await action();
        return { error: null, attempts: attempt };
      } catch (error) {
        lastError = error;
        loggers.browser.debug(`${actionName} failed`, { attempt, error: messageOf(error) });

        if (attempt < this.config.maxRetries) {
          await this.sleep(this.config.retryBaseDelay * Math.pow(2, attempt - 1));
        }
      }
    }

    return {
      error: `${actionName} failed after ${this.config.maxRetries} attempts: ${messageOf(lastError)}`,
      attempts: this.config.maxRetries,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private ensurePage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    return this.page;
  }

  /**
   * Loads `url` and returns the `request` transition for it.
   *
   * @throws NavigationError when every attempt fails
   */
  async navigate(url: string): Promise<Transition> {
    const page = this.ensurePage();
    const transition = Transition.create({ [url]: 'request' });

    const { error } = await this.withRetry(async () => {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.timeout });
    }, 'Navigate');

    if (error !== null) {
      throw new NavigationError(url, error);
    }

    loggers.browser.debug('Page loaded', { url, elapsed: transition.complete().elapsed });
    return transition;
  }

  /**
   * Resolves a CSS selector to the first matching element.
   *
   * @throws ElementNotFoundError when nothing matches
   */
  async locateElement(identifier: string): Promise<LocatedElement> {
    const page = this.ensurePage();
    const locator = page.locator(identifier);

    if ((await locator.count()) === 0) {
      throw new ElementNotFoundError(identifier);
    }

    return { identifier, locator: locator.first() };
  }

  /**
   * Fires `event` on the element. Resolves the completed transition, or
   * `undefined` when every attempt failed.
   */
  async fireEvent(
    element: LocatedElement,
    event: DomEventName,
    options: TransitionOptions
  ): Promise<Transition | undefined> {
    const transition = Transition.create({ [element.identifier]: event }, options);

    const { error } = await this.withRetry(
      () => this.dispatch(element.locator, transition.event ?? event, options),
      `Fire '${event}'`
    );

    if (error !== null) {
      loggers.browser.warn(error, { element: element.identifier });
      return undefined;
    }

    return transition.complete();
  }

  private async dispatch(
    locator: Locator,
    event: DomEventName,
    options: TransitionOptions
  ): Promise<void> {
    const timeout = this.config.timeout;
    const value = options.value;

    switch (event) {
      case 'click':
        await locator.click({ timeout });
        return;
      case 'input':
        if (typeof value === 'string') {
          // fill() fires the input event itself
          await locator.fill(value, { timeout });
          return;
        }
        await locator.dispatchEvent(event, options, { timeout });
        return;
      case 'change':
        if (typeof value === 'string') {
          await locator.fill(value, { timeout });
        }
        await locator.dispatchEvent(event, options, { timeout });
        return;
      default:
        await locator.dispatchEvent(event, options, { timeout });
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
