import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { PortalPageFactory } from './PortalPage.js';
import type { AdvertiserAssets, SearchPageSnapshot } from './types.js';
import { advertiserPageUrl } from './urls.js';

export const NO_SEARCH_INPUT = 'No search input found';

export interface PortalInspectorOptions {
  portalUrl: string;
  region: string;
  navigationTimeout: number;
  waitTimeout: number;
}

/** Read-only views of portal pages, used to keep the search heuristics in step with the live UI. */
export class PortalInspector {
  constructor(
    private readonly openPage: PortalPageFactory,
    private readonly options: PortalInspectorOptions,
    private readonly log: Logger = silentLogger,
  ) {}

  async inspectSearchPage(): Promise<SearchPageSnapshot> {
    const page = await this.openPage({
      viewport: { width: 1280, height: 800 },
      timeout: this.options.waitTimeout,
      navigationTimeout: this.options.navigationTimeout,
    });
    try {
      await page.goto(this.options.portalUrl, { waitUntil: 'networkidle0' });
      const html = await page.content();
      const match = await page.locateSearchInput();

      let searchInput = NO_SEARCH_INPUT;
      if (match) {
        this.log.info({ strategy: match.strategy }, 'Located search input');
        searchInput = match.html;
      } else {
        this.log.warn('No search input on the portal page');
        await page.screenshot('search_input_not_found');
      }

      return { pageContent: html.split(/\r?\n/), searchInput };
    } catch (err) {
      await page.screenshot('error_screenshot');
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Error getting page content: ${message}`, { cause: err });
    } finally {
      await page.close().catch((err: unknown) => this.log.warn({ err }, 'Failed to close portal page'));
    }
  }

  async collectAdvertiserAssets(advertiserId: string): Promise<AdvertiserAssets> {
    const page = await this.openPage({
      viewport: { width: 1280, height: 800 },
      timeout: this.options.waitTimeout,
      navigationTimeout: this.options.navigationTimeout,
    });
    try {
      const url = advertiserPageUrl(this.options.portalUrl, advertiserId, { region: this.options.region });
      this.log.info({ url }, 'Collecting advertiser page assets');
      await page.goto(url, { waitUntil: 'networkidle0' });
      const assets = await page.collectPageAssets();
      return { advertiserId, ...assets };
    } finally {
      await page.close().catch((err: unknown) => this.log.warn({ err }, 'Failed to close advertiser page'));
    }
  }
}
