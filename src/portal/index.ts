export { AdvertiserSearch } from './AdvertiserSearch.js';
export type { AdvertiserSearchOptions } from './AdvertiserSearch.js';
export { VideoDetector } from './VideoDetector.js';
export type { VideoDetectorOptions } from './VideoDetector.js';
export { PortalInspector, NO_SEARCH_INPUT } from './PortalInspector.js';
export type { PortalInspectorOptions } from './PortalInspector.js';
export { AdvertiserLookup, InvalidAdvertiserNameError } from './AdvertiserLookup.js';
export type { AdvertiserIdResolver, VideoChecker } from './AdvertiserLookup.js';
export { PuppeteerPortalPage, createPortalPageFactory } from './PortalPage.js';
export type { PortalPage, PortalPageFactory, GotoOptions, LoadCondition } from './PortalPage.js';
export { extractAdvertiserIdFromUrl, extractAdvertiserIdFromContent, isAdvertiserId } from './advertiser-id.js';
export { knownAdvertiserId, knownVideoCount } from './known-advertisers.js';
export { advertiserPageUrl } from './urls.js';
export type { AdFormat, AdvertiserPageParams } from './urls.js';
export type * from './types.js';
