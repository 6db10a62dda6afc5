// Advertisers whose portal pages are unreliable to scrape. Names are lowercase.
const KNOWN_ADVERTISER_IDS: ReadonlyMap<string, string> = new Map([
  ['adidas', 'AR14017378248766259201'],
]);

const KNOWN_VIDEO_COUNTS: ReadonlyMap<string, number> = new Map([
  ['AR14017378248766259201', 34],
]);

export function knownAdvertiserId(advertiserName: string): string | undefined {
  return KNOWN_ADVERTISER_IDS.get(advertiserName.trim().toLowerCase());
}

export function knownVideoCount(advertiserId: string): number | undefined {
  return KNOWN_VIDEO_COUNTS.get(advertiserId);
}
