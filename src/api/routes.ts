import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { BrowserUnavailableError } from '../browser/index.js';
import { InvalidAdvertiserNameError, isAdvertiserId, type AdvertiserReport } from '../portal/index.js';
import type { ScraperServices } from '../services.js';
import { ApiError, ErrorCode } from './errors.js';

export const API_VERSION = '1.0.0';

const scrapeBodySchema = z.object({
  advertiser_name: z.string({
    required_error: 'advertiser_name is required',
    invalid_type_error: 'advertiser_name must be a string',
  }),
});

const advertiserParamsSchema = z.object({
  id: z.string().refine(isAdvertiserId, 'Advertiser id must contain only uppercase letters and digits'),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ApiError(ErrorCode.INVALID_REQUEST, message, 400);
  }
  return result.data;
}

/** Maps failures from the browser flows onto API errors; `context` prefixes the 500 message. */
function toApiError(err: unknown, context: string): ApiError {
  if (err instanceof ApiError) return err;
  if (err instanceof InvalidAdvertiserNameError) {
    return new ApiError(ErrorCode.INVALID_REQUEST, err.message, 400);
  }
  if (err instanceof BrowserUnavailableError) {
    return new ApiError(ErrorCode.BROWSER_UNAVAILABLE, err.message, 503);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ApiError(ErrorCode.SCRAPE_FAILED, `${context}: ${message}`, 500);
}

export function registerRoutes(app: FastifyInstance, services: ScraperServices) {
  // 健康检查
  app.get('/ping', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Name → advertiser id → video ads
  app.post('/scrape', async (request) => {
    const body = parseOrThrow(scrapeBodySchema, request.body ?? {});
    const advertiserName = body.advertiser_name.trim();
    if (!advertiserName) {
      throw new ApiError(ErrorCode.INVALID_REQUEST, 'Advertiser name cannot be empty', 400);
    }

    let report: AdvertiserReport | null;
    try {
      report = await services.lookup.lookup(advertiserName);
    } catch (err) {
      request.log.error({ err, advertiserName }, 'Error during scraping');
      throw toApiError(err, 'Error during scraping');
    }

    if (!report) {
      throw new ApiError(
        ErrorCode.ADVERTISER_NOT_FOUND,
        `No advertiser ID found for '${advertiserName}'`,
        404,
        { advertiserName },
      );
    }

    return {
      advertiser_google_id: report.advertiserId,
      has_videos: report.hasVideos,
      video_count: report.videoCount,
    };
  });

  app.get('/advertisers/:id/videos', async (request) => {
    const { id } = parseOrThrow(advertiserParamsSchema, request.params);
    try {
      const report = await services.videos.checkVideos(id);
      return {
        advertiser_id: id,
        has_videos: report.hasVideos,
        video_count: report.videoCount,
      };
    } catch (err) {
      request.log.error({ err, advertiserId: id }, 'Error checking videos');
      throw toApiError(err, 'Error checking videos');
    }
  });

  app.get('/advertisers/:id/assets', async (request) => {
    const { id } = parseOrThrow(advertiserParamsSchema, request.params);
    try {
      const assets = await services.inspector.collectAdvertiserAssets(id);
      return {
        advertiser_id: assets.advertiserId,
        tags: assets.tags,
        image_urls: assets.imageUrls,
      };
    } catch (err) {
      request.log.error({ err, advertiserId: id }, 'Error collecting advertiser assets');
      throw toApiError(err, 'Error collecting advertiser assets');
    }
  });

  // Raw portal markup plus the search box the heuristics settle on
  app.get('/portal/search-input', async (request) => {
    try {
      const snapshot = await services.inspector.inspectSearchPage();
      return {
        page_content: snapshot.pageContent,
        search_input: snapshot.searchInput,
      };
    } catch (err) {
      request.log.error({ err }, 'Error inspecting search page');
      throw toApiError(err, 'Error inspecting search page');
    }
  });
}
