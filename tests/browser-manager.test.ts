import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrowserManager, BrowserUnavailableError, DEFAULT_USER_AGENT } from '../src/browser/BrowserManager.js';

const { launch } = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock('puppeteer-core', () => ({ default: { launch } }));

function fakeBrowser() {
  const page = {
    setViewport: vi.fn(async () => undefined),
    setUserAgent: vi.fn(async () => undefined),
    setDefaultTimeout: vi.fn(),
    setDefaultNavigationTimeout: vi.fn(),
  };
  return {
    page,
    connected: true,
    once: vi.fn(),
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => undefined),
  };
}

describe('BrowserManager', () => {
  beforeEach(() => {
    launch.mockReset();
  });

  it('fails with BrowserUnavailableError when no Chrome is found', async () => {
    const manager = new BrowserManager();
    vi.spyOn(manager, 'resolveExecutablePath').mockReturnValue(undefined);

    await expect(manager.newPage()).rejects.toThrow(BrowserUnavailableError);
    await expect(manager.newPage()).rejects.toThrow(/Chrome\/Chromium not found/);
    expect(launch).not.toHaveBeenCalled();
  });

  it('wraps a failed launch in BrowserUnavailableError', async () => {
    launch.mockRejectedValueOnce(new Error('Browser was not found at the configured executablePath (/nonexistent/chrome)'));
    const manager = new BrowserManager({ chromePath: '/nonexistent/chrome' });

    const error = await manager.newPage().then(
      () => null,
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(BrowserUnavailableError);
    expect(error).toHaveProperty(
      'message',
      'Failed to launch browser: Browser was not found at the configured executablePath (/nonexistent/chrome)',
    );
  });

  it('shares one launch between concurrent callers', async () => {
    const browser = fakeBrowser();
    launch.mockResolvedValue(browser);
    const manager = new BrowserManager({ chromePath: '/opt/chrome/chrome', proxyServer: 'http://proxy.test:8080' });

    await Promise.all([manager.newPage(), manager.newPage(), manager.launch()]);

    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith({
      executablePath: '/opt/chrome/chrome',
      headless: true,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-blink-features=AutomationControlled',
        '--disable-infobars',
        `--user-agent=${DEFAULT_USER_AGENT}`,
        '--proxy-server=http://proxy.test:8080',
      ],
    });
    expect(browser.newPage).toHaveBeenCalledTimes(2);
  });

  it('launches again after a failed launch', async () => {
    const browser = fakeBrowser();
    launch.mockRejectedValueOnce(new Error('spawn EACCES')).mockResolvedValueOnce(browser);
    const manager = new BrowserManager({ chromePath: '/opt/chrome/chrome' });

    await expect(manager.newPage()).rejects.toThrow('Failed to launch browser: spawn EACCES');
    await expect(manager.newPage()).resolves.toBe(browser.page);
    expect(launch).toHaveBeenCalledTimes(2);
  });

  it('applies the page options', async () => {
    const browser = fakeBrowser();
    launch.mockResolvedValue(browser);
    const manager = new BrowserManager({ chromePath: '/opt/chrome/chrome' });

    await manager.newPage({ viewport: { width: 1280, height: 720 }, timeout: 5000, navigationTimeout: 7000 });

    expect(browser.page.setViewport).toHaveBeenCalledWith({ width: 1280, height: 720 });
    expect(browser.page.setUserAgent).toHaveBeenCalledWith(DEFAULT_USER_AGENT);
    expect(browser.page.setDefaultTimeout).toHaveBeenCalledWith(5000);
    expect(browser.page.setDefaultNavigationTimeout).toHaveBeenCalledWith(7000);
  });

  it('closes the launched browser', async () => {
    const browser = fakeBrowser();
    launch.mockResolvedValue(browser);
    const manager = new BrowserManager({ chromePath: '/opt/chrome/chrome' });

    await manager.close();
    expect(browser.close).not.toHaveBeenCalled();

    await manager.launch();
    await manager.close();
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
