import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { AdvertiserReport, VideoReport } from './types.js';

export class InvalidAdvertiserNameError extends Error {
  constructor() {
    super('Advertiser name cannot be empty');
    this.name = 'InvalidAdvertiserNameError';
  }
}

export interface AdvertiserIdResolver {
  findAdvertiserId(advertiserName: string): Promise<string | null>;
}

export interface VideoChecker {
  checkVideos(advertiserId: string): Promise<VideoReport>;
}

/** Name → id → video report, the flow behind `POST /scrape`. */
export class AdvertiserLookup {
  constructor(
    private readonly search: AdvertiserIdResolver,
    private readonly videos: VideoChecker,
    private readonly log: Logger = silentLogger,
  ) {}

  /** `null` when the portal yields no id for the name. */
  async lookup(advertiserName: string): Promise<AdvertiserReport | null> {
    const name = advertiserName.trim();
    if (!name) throw new InvalidAdvertiserNameError();

    const advertiserId = await this.search.findAdvertiserId(name);
    if (!advertiserId) {
      this.log.info({ advertiserName: name }, 'Advertiser not found');
      return null;
    }

    const videos = await this.videos.checkVideos(advertiserId);
    return { advertiserId, ...videos };
  }
}
