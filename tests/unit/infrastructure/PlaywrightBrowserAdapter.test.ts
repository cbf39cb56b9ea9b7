import { PlaywrightBrowserAdapter } from '../../../src/infrastructure/browser/PlaywrightBrowserAdapter';
import { Transition } from '../../../src/domain/dom/Transition';
import { ElementNotFoundError, NavigationError } from '../../../src/domain/errors/AppErrors';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';
import { chromium, Browser, BrowserContext, Locator, Page } from 'playwright';

// Mock playwright
jest.mock('playwright', () => ({
  chromium: {
    launch: jest.fn(),
  },
}));

describe('PlaywrightBrowserAdapter', () => {
  let adapter: PlaywrightBrowserAdapter;
  let mockBrowser: jest.Mocked<Browser>;
  let mockContext: jest.Mocked<BrowserContext>;
  let mockPage: jest.Mocked<Page>;
  let mockLocator: jest.Mocked<Locator>;

  beforeEach(() => {
    jest.clearAllMocks();
    setGlobalLoggerConfig({ customHandler: () => undefined });

    mockLocator = {
      count: jest.fn().mockResolvedValue(1),
      click: jest.fn().mockResolvedValue(undefined),
      fill: jest.fn().mockResolvedValue(undefined),
      dispatchEvent: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<Locator>;
    mockLocator.first = jest.fn().mockReturnValue(mockLocator);

    mockPage = {
      setDefaultTimeout: jest.fn(),
      goto: jest.fn().mockResolvedValue(null),
      locator: jest.fn().mockReturnValue(mockLocator),
      close: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<Page>;

    mockContext = {
      newPage: jest.fn().mockResolvedValue(mockPage),
      close: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<BrowserContext>;

    mockBrowser = {
      newContext: jest.fn().mockResolvedValue(mockContext),
      close: jest.fn().mockResolvedValue(undefined),
    } as unknown as jest.Mocked<Browser>;

    (chromium.launch as jest.Mock).mockResolvedValue(mockBrowser);

    adapter = new PlaywrightBrowserAdapter({
      headless: true,
      timeout: 5000,
      maxRetries: 2,
      retryBaseDelay: 0,
    });
  });

  afterEach(() => {
    setGlobalLoggerConfig({});
  });

  describe('initialize', () => {
    it('should launch chromium with the configured viewport and timeout', async () => {
      await adapter.initialize();

      expect(chromium.launch).toHaveBeenCalledWith({ headless: true });
      expect(mockBrowser.newContext).toHaveBeenCalledWith({ viewport: { width: 1280, height: 720 } });
      expect(mockPage.setDefaultTimeout).toHaveBeenCalledWith(5000);
      expect(adapter.isReady()).toBe(true);
    });

    it('should map the browser section of the app config', async () => {
      const configured = PlaywrightBrowserAdapter.fromConfig({
        headless: false,
        timeout: 1000,
        width: 800,
        height: 600,
        maxRetries: 1,
        retryBaseDelay: 0,
      });

      await configured.initialize();

      expect(chromium.launch).toHaveBeenCalledWith({ headless: false });
      expect(mockBrowser.newContext).toHaveBeenCalledWith({ viewport: { width: 800, height: 600 } });
      expect(mockPage.setDefaultTimeout).toHaveBeenCalledWith(1000);
    });
  });

  describe('close', () => {
    it('should close page, context and browser', async () => {
      await adapter.initialize();
      await adapter.close();

      expect(mockPage.close).toHaveBeenCalled();
      expect(mockContext.close).toHaveBeenCalled();
      expect(mockBrowser.close).toHaveBeenCalled();
      expect(adapter.isReady()).toBe(false);
    });
  });

  it('should refuse to work before initialization', async () => {
    await expect(adapter.locateElement('#save')).rejects.toThrow(
      'Browser not initialized. Call initialize() first.'
    );
  });

  describe('navigate', () => {
    beforeEach(async () => {
      await adapter.initialize();
    });

    it('should return a completed request transition for the URL', async () => {
      const transition = await adapter.navigate('https://example.com/form');

      expect(mockPage.goto).toHaveBeenCalledWith('https://example.com/form', {
        waitUntil: 'domcontentloaded',
        timeout: 5000,
      });
      expect(transition.element).toBe('https://example.com/form');
      expect(transition.event).toBe('request');
      expect(transition.isCompleted()).toBe(true);
      expect(transition.depth()).toBe(0);
    });

    it('should retry and then throw NavigationError', async () => {
      mockPage.goto.mockRejectedValue(new Error('net::ERR_CONNECTION_REFUSED'));

      await expect(adapter.navigate('https://example.com')).rejects.toThrow(NavigationError);
      expect(mockPage.goto).toHaveBeenCalledTimes(2);
    });
  });

  describe('locateElement', () => {
    beforeEach(async () => {
      await adapter.initialize();
    });

    it('should resolve the first element matching the selector', async () => {
      const located = await adapter.locateElement('#save');

      expect(mockPage.locator).toHaveBeenCalledWith('#save');
      expect(mockLocator.first).toHaveBeenCalled();
      expect(located.identifier).toBe('#save');
      expect(located.locator).toBe(mockLocator);
    });

    it('should throw ElementNotFoundError when nothing matches', async () => {
      mockLocator.count.mockResolvedValue(0);

      await expect(adapter.locateElement('#gone')).rejects.toThrow(ElementNotFoundError);
    });
  });

  describe('fireEvent', () => {
    beforeEach(async () => {
      await adapter.initialize();
    });

    it('should click and return the completed transition', async () => {
      const element = await adapter.locateElement('#save');

      const transition = await adapter.fireEvent(element, 'click', {});

      expect(mockLocator.click).toHaveBeenCalledWith({ timeout: 5000 });
      expect(transition?.toStructured()).toEqual({
        element: '#save',
        event: 'click',
        options: {},
        elapsed: expect.any(Number),
      });
      expect(transition?.isCompleted()).toBe(true);
    });

    it('should fill inputs with the value option', async () => {
      const element = await adapter.locateElement('#name');

      await adapter.fireEvent(element, 'input', { value: 'Ada' });

      expect(mockLocator.fill).toHaveBeenCalledWith('Ada', { timeout: 5000 });
      expect(mockLocator.dispatchEvent).not.toHaveBeenCalled();
    });

    it('should fill and then dispatch change events', async () => {
      const element = await adapter.locateElement('#country');

      await adapter.fireEvent(element, 'change', { value: 'PT' });

      expect(mockLocator.fill).toHaveBeenCalledWith('PT', { timeout: 5000 });
      expect(mockLocator.dispatchEvent).toHaveBeenCalledWith('change', { value: 'PT' }, { timeout: 5000 });
    });

    it('should dispatch any other event with the options as event init', async () => {
      const element = await adapter.locateElement('#menu');

      const transition = await adapter.fireEvent(element, 'mouseover', { bubbles: true });

      expect(mockLocator.dispatchEvent).toHaveBeenCalledWith(
        'mouseover',
        { bubbles: true },
        { timeout: 5000 }
      );
      expect(transition?.options).toEqual({ bubbles: true });
    });

    it('should retry a failed dispatch', async () => {
      mockLocator.click.mockRejectedValueOnce(new Error('detached')).mockResolvedValueOnce(undefined);
      const element = await adapter.locateElement('#save');

      const transition = await adapter.fireEvent(element, 'click', {});

      expect(mockLocator.click).toHaveBeenCalledTimes(2);
      expect(transition?.isCompleted()).toBe(true);
    });

    it('should return undefined when every attempt fails', async () => {
      mockLocator.click.mockRejectedValue(new Error('detached'));
      const element = await adapter.locateElement('#save');

      const transition = await adapter.fireEvent(element, 'click', {});

      expect(transition).toBeUndefined();
      expect(mockLocator.click).toHaveBeenCalledTimes(2);
    });
  });

  describe('as replay browser', () => {
    it('should replay a recorded transition into an equal one', async () => {
      await adapter.initialize();
      const recorded = Transition.create({ '#save': 'click' }, { source: 'crawl' }, () => undefined);

      const replayed = await recorded.replay(adapter);

      expect(replayed).toBeDefined();
      expect(replayed?.equals(recorded)).toBe(true);
    });
  });
});
