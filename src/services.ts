import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { BrowserManager, DebugCapture } from './browser/index.js';
import {
  AdvertiserLookup,
  AdvertiserSearch,
  PortalInspector,
  VideoDetector,
  createPortalPageFactory,
  type VideoChecker,
} from './portal/index.js';
import type { AdvertiserAssets, AdvertiserReport, SearchPageSnapshot } from './portal/index.js';

/** What the HTTP routes and MCP tools call into. */
export interface ScraperServices {
  lookup: { lookup(advertiserName: string): Promise<AdvertiserReport | null> };
  videos: VideoChecker;
  inspector: {
    inspectSearchPage(): Promise<SearchPageSnapshot>;
    collectAdvertiserAssets(advertiserId: string): Promise<AdvertiserAssets>;
  };
}

export interface ScraperRuntime extends ScraperServices {
  browserManager: BrowserManager;
  capture: DebugCapture;
  close(): Promise<void>;
}

export function createScraperRuntime(config: AppConfig, log: Logger): ScraperRuntime {
  const browserManager = new BrowserManager(
    {
      chromePath: config.browser.chromePath,
      headless: config.browser.headless,
      proxyServer: config.browser.proxyServer,
    },
    log,
  );
  const capture = new DebugCapture(config.screenshots, log);
  const openPage = createPortalPageFactory(browserManager, capture);

  const search = new AdvertiserSearch(
    openPage,
    { portalUrl: config.portal.url, timeout: config.timeouts.search },
    log,
  );
  const videos = new VideoDetector(
    openPage,
    {
      portalUrl: config.portal.url,
      region: config.portal.region,
      timeout: config.timeouts.video,
      navigationTimeout: config.timeouts.videoNavigation,
    },
    log,
  );
  const inspector = new PortalInspector(
    openPage,
    {
      portalUrl: config.portal.url,
      region: config.portal.region,
      navigationTimeout: config.timeouts.navigation,
      waitTimeout: config.timeouts.wait,
    },
    log,
  );

  return {
    browserManager,
    capture,
    lookup: new AdvertiserLookup(search, videos, log),
    videos,
    inspector,
    close: () => browserManager.close(),
  };
}
