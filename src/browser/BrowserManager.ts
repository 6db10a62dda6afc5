import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { existsSync } from 'node:fs';
import { execSync } from 'node:child_process';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export interface BrowserOptions {
  chromePath?: string;
  headless?: boolean;
  proxyServer?: string;
  userAgent?: string;
}

export interface PageOptions {
  viewport?: { width: number; height: number };
  userAgent?: string;
  /** Default timeout for waits on this page (ms). */
  timeout?: number;
  /** Default timeout for navigations on this page (ms). */
  navigationTimeout?: number;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

export class BrowserUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrowserUnavailableError';
  }
}

export class BrowserManager {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(
    private readonly options: BrowserOptions = {},
    private readonly log: Logger = silentLogger,
  ) {}

  /** Starts Chrome now instead of on the first page request. */
  async launch(): Promise<void> {
    await this.getBrowser();
  }

  /** Resolves the running browser, launching it once even under concurrent callers. */
  private async getBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;
    if (!this.launching) {
      this.launching = this.launchInstance()
        .then((browser) => {
          this.browser = browser;
          browser.once('disconnected', () => {
            if (this.browser === browser) this.browser = null;
          });
          return browser;
        })
        .finally(() => {
          this.launching = null;
        });
    }
    return this.launching;
  }

  private async launchInstance(): Promise<Browser> {
    const executablePath = this.resolveExecutablePath();
    if (!executablePath) {
      throw new BrowserUnavailableError(
        'Chrome/Chromium not found. Please set the CHROME_PATH environment variable to your Chrome executable path.\n' +
        '  Example (macOS):   export CHROME_PATH="/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"\n' +
        '  Example (Windows): set CHROME_PATH=C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe\n' +
        '  Example (Linux):   export CHROME_PATH=/usr/bin/google-chrome',
      );
    }

    const args = [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-blink-features=AutomationControlled',
      '--disable-infobars',
      `--user-agent=${this.options.userAgent || DEFAULT_USER_AGENT}`,
    ];

    if (this.options.proxyServer) {
      args.push(`--proxy-server=${this.options.proxyServer}`);
    }

    const headless = this.options.headless ?? true;
    this.log.info({ executablePath, headless }, 'Launching browser');
    try {
      return await puppeteer.launch({ executablePath, headless, args });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new BrowserUnavailableError(`Failed to launch browser: ${message}`, { cause: err });
    }
  }

  resolveExecutablePath(): string | undefined {
    return this.options.chromePath || detectChromePath();
  }

  async newPage(options: PageOptions = {}): Promise<Page> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();
    if (options.viewport) {
      await page.setViewport(options.viewport);
    }
    await page.setUserAgent(options.userAgent || this.options.userAgent || DEFAULT_USER_AGENT);
    if (options.timeout) {
      page.setDefaultTimeout(options.timeout);
    }
    if (options.navigationTimeout) {
      page.setDefaultNavigationTimeout(options.navigationTimeout);
    }
    return page;
  }

  async close(): Promise<void> {
    const pending = this.launching;
    if (pending) {
      await pending.catch(() => undefined);
    }
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
    }
  }
}

export function detectChromePath(): string | undefined {
  const found = getChromeCandidates().find(p => existsSync(p));
  if (found) return found;
  // Fallback: try system PATH via which/where
  try {
    const cmd = process.platform === 'win32' ? 'where chrome' : 'which google-chrome || which chromium-browser || which chromium';
    const resolved = execSync(cmd, { encoding: 'utf-8', timeout: 3000, stdio: ['ignore', 'pipe', 'ignore'] }).trim().split('\n')[0];
    return resolved || undefined;
  } catch {
    return undefined;
  }
}

function getChromeCandidates(): string[] {
  const platform = process.platform;
  if (platform === 'darwin') {
    return [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
    ];
  }
  if (platform === 'win32') {
    const envDirs = [
      process.env.LOCALAPPDATA,
      process.env.PROGRAMFILES,
      process.env['PROGRAMFILES(X86)'],
    ].filter((dir): dir is string => Boolean(dir));
    const suffixes = [
      '\\Google\\Chrome\\Application\\chrome.exe',
      '\\Microsoft\\Edge\\Application\\msedge.exe',
    ];
    return envDirs.flatMap(dir => suffixes.map(s => dir + s));
  }
  // linux
  return [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium-browser',
    '/usr/bin/chromium',
    '/snap/bin/chromium',
  ];
}
