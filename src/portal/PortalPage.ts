import { TimeoutError, type KeyInput, type Page, type PuppeteerLifeCycleEvent } from 'puppeteer-core';
import type { BrowserManager, DebugCapture, PageOptions } from '../browser/index.js';
import {
  clickFirstSearchResult,
  collectPageAssets,
  findAdvertiserIdCandidates,
  locateSearchInput,
  scanVideoIndicators,
} from './page-scripts.js';
import type { PageAssets, SearchInputMatch, VideoScan } from './types.js';

export type LoadCondition = PuppeteerLifeCycleEvent;

export interface GotoOptions {
  waitUntil?: LoadCondition;
  timeout?: number;
}

/**
 * Page operations the portal flows are written against. `PuppeteerPortalPage`
 * is the real one; tests drive the flows through an in-memory fake.
 */
export interface PortalPage {
  goto(url: string, options?: GotoOptions): Promise<void>;
  /** Resolves once `document.readyState` has left `loading`. */
  waitForDomReady(timeout?: number): Promise<void>;
  /** `false` when nothing matched before the timeout. */
  waitForSelector(selector: string, timeout?: number): Promise<boolean>;
  click(selector: string): Promise<void>;
  /** Clears the matched input, then types `value` into it. */
  fill(selector: string, value: string): Promise<void>;
  press(key: KeyInput): Promise<void>;
  type(text: string): Promise<void>;
  pause(ms: number): Promise<void>;
  /** The live `window.location.href`, which tracks client-side routing. */
  currentUrl(): Promise<string>;
  content(): Promise<string>;
  clickFirstSearchResult(): Promise<string | null>;
  findAdvertiserIdCandidates(advertiserName: string): Promise<string[]>;
  scanVideoIndicators(): Promise<VideoScan>;
  locateSearchInput(): Promise<SearchInputMatch | null>;
  collectPageAssets(): Promise<PageAssets>;
  screenshot(name: string): Promise<void>;
  close(): Promise<void>;
}

export type PortalPageFactory = (options?: PageOptions) => Promise<PortalPage>;

export class PuppeteerPortalPage implements PortalPage {
  constructor(
    private readonly page: Page,
    private readonly capture: DebugCapture,
  ) {}

  async goto(url: string, options: GotoOptions = {}): Promise<void> {
    await this.page.goto(url, options);
  }

  async waitForDomReady(timeout?: number): Promise<void> {
    await this.page.waitForFunction(() => document.readyState !== 'loading', { timeout });
  }

  async waitForSelector(selector: string, timeout?: number): Promise<boolean> {
    try {
      const handle = await this.page.waitForSelector(selector, { timeout });
      if (!handle) return false;
      await handle.dispose();
      return true;
    } catch (err) {
      if (err instanceof TimeoutError) return false;
      throw err;
    }
  }

  async click(selector: string): Promise<void> {
    await this.page.click(selector);
  }

  async fill(selector: string, value: string): Promise<void> {
    const handle = await this.page.$(selector);
    if (!handle) throw new Error(`Element not found: ${selector}`);
    try {
      await handle.evaluate((el) => {
        if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
          el.value = '';
          el.dispatchEvent(new Event('input', { bubbles: true }));
        }
      });
      if (value) await handle.type(value);
    } finally {
      await handle.dispose();
    }
  }

  async press(key: KeyInput): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async type(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  async pause(ms: number): Promise<void> {
    await new Promise(r => setTimeout(r, ms));
  }

  async currentUrl(): Promise<string> {
    return this.page.evaluate(() => window.location.href);
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async clickFirstSearchResult(): Promise<string | null> {
    return this.page.evaluate(clickFirstSearchResult);
  }

  async findAdvertiserIdCandidates(advertiserName: string): Promise<string[]> {
    return this.page.evaluate(findAdvertiserIdCandidates, advertiserName);
  }

  async scanVideoIndicators(): Promise<VideoScan> {
    return this.page.evaluate(scanVideoIndicators);
  }

  async locateSearchInput(): Promise<SearchInputMatch | null> {
    return this.page.evaluate(locateSearchInput);
  }

  async collectPageAssets(): Promise<PageAssets> {
    return this.page.evaluate(collectPageAssets);
  }

  async screenshot(name: string): Promise<void> {
    await this.capture.capture(this.page, name);
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

export function createPortalPageFactory(browserManager: BrowserManager, capture: DebugCapture): PortalPageFactory {
  return async (options) => {
    const page = await browserManager.newPage(options);
    return new PuppeteerPortalPage(page, capture);
  };
}
