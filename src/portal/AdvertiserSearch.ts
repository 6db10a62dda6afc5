import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { extractAdvertiserIdFromContent, extractAdvertiserIdFromUrl } from './advertiser-id.js';
import { knownAdvertiserId } from './known-advertisers.js';
import type { PortalPage, PortalPageFactory } from './PortalPage.js';

const SEARCH_INPUT_SELECTOR = 'input.input.input-area';
const URL_POLL_ATTEMPTS = 3;
const URL_POLL_INTERVAL = 2000;
const STEP_TIMEOUT = 10000;

export interface AdvertiserSearchOptions {
  portalUrl: string;
  /** Default timeout for every wait on the search page (ms). */
  timeout: number;
}

/**
 * Resolves an advertiser name to its portal id by driving the portal's
 * search box. Each heuristic is tried once, in order; a failing heuristic
 * is logged and the next one runs.
 */
export class AdvertiserSearch {
  constructor(
    private readonly openPage: PortalPageFactory,
    private readonly options: AdvertiserSearchOptions,
    private readonly log: Logger = silentLogger,
  ) {}

  async findAdvertiserId(advertiserName: string): Promise<string | null> {
    this.log.info({ advertiserName }, 'Searching for advertiser id');

    const known = knownAdvertiserId(advertiserName);
    if (known) {
      this.log.info({ advertiserName, advertiserId: known }, 'Using known advertiser id');
      return known;
    }

    const page = await this.openPage({
      viewport: { width: 1280, height: 720 },
      timeout: this.options.timeout,
      navigationTimeout: this.options.timeout,
    });
    try {
      await page.goto(this.options.portalUrl, { waitUntil: 'networkidle0' });
      await page.screenshot('initial_page');

      let advertiserId: string | null = null;
      try {
        advertiserId = await this.searchWithInput(page, advertiserName);
      } catch (err) {
        this.log.error({ err }, 'Direct input search failed');
        await page.screenshot('strategy1_error');
      }

      if (!advertiserId) {
        try {
          advertiserId = await this.searchWithKeyboard(page, advertiserName);
        } catch (err) {
          this.log.error({ err }, 'Keyboard search failed');
          await page.screenshot('strategy2_error');
        }
      }

      if (advertiserId) {
        this.log.info({ advertiserName, advertiserId }, 'Found advertiser id');
      } else {
        this.log.warn({ advertiserName }, 'No advertiser id found');
      }
      return advertiserId;
    } catch (err) {
      this.log.error({ err, advertiserName }, 'Advertiser search aborted');
      return null;
    } finally {
      await page.close().catch((err: unknown) => this.log.warn({ err }, 'Failed to close search page'));
    }
  }

  /** Types into the portal's own search input, then reads the id from the URL, a result click, or the markup. */
  private async searchWithInput(page: PortalPage, advertiserName: string): Promise<string | null> {
    this.log.info('Trying direct input search');
    await page.waitForDomReady();
    if (!(await page.waitForSelector(SEARCH_INPUT_SELECTOR, STEP_TIMEOUT))) {
      this.log.warn({ selector: SEARCH_INPUT_SELECTOR }, 'Search input not found');
      return null;
    }

    await page.click(SEARCH_INPUT_SELECTOR);
    await page.pause(500);
    await page.fill(SEARCH_INPUT_SELECTOR, '');
    await page.pause(300);
    await page.fill(SEARCH_INPUT_SELECTOR, advertiserName);
    await page.screenshot('before_search');

    const preSearchUrl = await page.currentUrl();
    this.log.debug({ url: preSearchUrl }, 'URL before search');
    await page.press('Enter');
    await page.pause(2000);
    try {
      await page.waitForDomReady(STEP_TIMEOUT);
    } catch (err) {
      this.log.warn({ err }, 'Timed out waiting for the results page, continuing');
    }
    await page.screenshot('after_search');

    const fromUrl = await this.pollForAdvertiserId(page, preSearchUrl);
    if (fromUrl) return fromUrl;

    await page.screenshot('before_clicking_results');
    try {
      const clicked = await page.clickFirstSearchResult();
      if (clicked) {
        this.log.info({ selector: clicked }, 'Clicked a search result');
        await page.pause(3000);
        const url = await page.currentUrl();
        const fromResult = extractAdvertiserIdFromUrl(url);
        if (fromResult) return fromResult;
      }
    } catch (err) {
      this.log.warn({ err }, 'Could not click a search result');
    }

    return this.extractFromContent(page, advertiserName);
  }

  /** Reloads the portal and reaches the search box by tabbing from the body. */
  private async searchWithKeyboard(page: PortalPage, advertiserName: string): Promise<string | null> {
    this.log.info('Trying keyboard search');
    await page.goto(this.options.portalUrl, { waitUntil: 'networkidle0' });
    await page.waitForDomReady();
    await page.click('body');
    for (let i = 0; i < 3; i++) {
      await page.press('Tab');
      await page.pause(300);
    }
    await page.type(advertiserName);

    const preSearchUrl = await page.currentUrl();
    await page.press('Enter');
    await page.pause(3000);

    const fromUrl = await this.pollForAdvertiserId(page, preSearchUrl);
    if (fromUrl) return fromUrl;

    return this.extractFromContent(page, advertiserName);
  }

  /**
   * Watches `window.location` for the portal's client-side navigation. Stops
   * at the first URL change, whether or not that URL carries an id.
   */
  private async pollForAdvertiserId(page: PortalPage, preSearchUrl: string): Promise<string | null> {
    for (let attempt = 1; attempt <= URL_POLL_ATTEMPTS; attempt++) {
      try {
        const url = await page.currentUrl();
        this.log.debug({ attempt, url }, 'Polled current URL');
        if (url && url !== preSearchUrl) {
          return extractAdvertiserIdFromUrl(url);
        }
      } catch (err) {
        this.log.warn({ err, attempt }, 'Could not read current URL');
      }
      if (attempt < URL_POLL_ATTEMPTS) await page.pause(URL_POLL_INTERVAL);
    }
    return null;
  }

  private async extractFromContent(page: PortalPage, advertiserName: string): Promise<string | null> {
    this.log.info('Extracting advertiser id from page content');
    await page.screenshot('page_content');
    try {
      const fromHtml = extractAdvertiserIdFromContent(await page.content());
      if (fromHtml) return fromHtml;

      const candidates = await page.findAdvertiserIdCandidates(advertiserName);
      return candidates[0] ?? null;
    } catch (err) {
      this.log.warn({ err }, 'Content extraction failed');
      return null;
    }
  }
}
