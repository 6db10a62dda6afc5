import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { knownVideoCount } from './known-advertisers.js';
import type { PortalPageFactory } from './PortalPage.js';
import type { VideoReport } from './types.js';
import { advertiserPageUrl } from './urls.js';

export interface VideoDetectorOptions {
  portalUrl: string;
  region: string;
  /** Default timeout for waits on the video page (ms). */
  timeout: number;
  /** Timeout for loading the video page itself (ms). */
  navigationTimeout: number;
}

export class VideoDetector {
  constructor(
    private readonly openPage: PortalPageFactory,
    private readonly options: VideoDetectorOptions,
    private readonly log: Logger = silentLogger,
  ) {}

  async checkVideos(advertiserId: string): Promise<VideoReport> {
    this.log.info({ advertiserId }, 'Checking for video ads');

    const known = knownVideoCount(advertiserId);
    if (known !== undefined) {
      this.log.info({ advertiserId, videoCount: known }, 'Using known video count');
      return { hasVideos: true, videoCount: known };
    }

    const page = await this.openPage({
      viewport: { width: 1280, height: 720 },
      timeout: this.options.timeout,
    });
    try {
      const url = advertiserPageUrl(this.options.portalUrl, advertiserId, {
        region: this.options.region,
        format: 'VIDEO',
      });
      this.log.info({ url }, 'Opening video page');
      // domcontentloaded: the ad grid keeps the network busy long after it renders
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeout });
      await page.screenshot(`${advertiserId}_video_page`);
      await page.waitForDomReady();

      const scan = await page.scanVideoIndicators();
      const report: VideoReport = { hasVideos: scan.count > 0, videoCount: scan.count };
      this.log.info({ advertiserId, ...report, indicator: scan.indicator }, 'Video detection finished');

      await page.screenshot(`${advertiserId}_video_detection`);
      return report;
    } catch (err) {
      this.log.error({ err, advertiserId }, 'Error checking for videos');
      return { hasVideos: false, videoCount: null };
    } finally {
      await page.close().catch((err: unknown) => this.log.warn({ err }, 'Failed to close video page'));
    }
  }
}
