import { mkdirSync } from 'node:fs';
import path from 'node:path';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

/** The part of a puppeteer `Page` a capture needs. */
export interface ScreenshotTarget {
  screenshot(options: { path: `${string}.png` }): Promise<unknown>;
}

export interface DebugCaptureOptions {
  enabled: boolean;
  dir: string;
}

/**
 * Writes named screenshots of the page under scrutiny. A screenshot that
 * cannot be taken is logged and skipped; it never fails the scrape.
 */
export class DebugCapture {
  private dirReady = false;

  constructor(
    private readonly options: DebugCaptureOptions,
    private readonly log: Logger = silentLogger,
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  get dir(): string {
    return path.resolve(this.options.dir);
  }

  /** File path a capture with this name is written to. */
  fileFor(name: string): `${string}.png` {
    const safeName = name.replace(/[^A-Za-z0-9_-]+/g, '_');
    return `${path.join(this.dir, safeName)}.png`;
  }

  ensureDir(): void {
    if (this.dirReady) return;
    mkdirSync(this.dir, { recursive: true });
    this.dirReady = true;
  }

  async capture(page: ScreenshotTarget, name: string): Promise<void> {
    if (!this.options.enabled) return;
    const file = this.fileFor(name);
    try {
      this.ensureDir();
      await page.screenshot({ path: file });
      this.log.debug({ file }, 'Saved debug screenshot');
    } catch (err) {
      this.log.warn({ err, file }, 'Could not save debug screenshot');
    }
  }
}
