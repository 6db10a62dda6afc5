/**
 * Advertiser ids on the Ads Transparency Center look like `AR14017378248766259201`.
 * The portal exposes them in advertiser page paths (`/advertiser/AR…`),
 * occasionally as an `id` query parameter, and in the page markup.
 */

const ADVERTISER_PATH = /advertiser\/([A-Z0-9]+)/;
const AR_ID = /AR\d+/;
const ID_PARAM = /[?&]id=([A-Z0-9]+)/;
const CONTENT_ID = /AR\d+|advertiser\/([A-Z0-9]+)/g;

export function isAdvertiserId(value: string): boolean {
  return /^[A-Z0-9]+$/.test(value);
}

export function extractAdvertiserIdFromUrl(url: string): string | null {
  const pathMatch = ADVERTISER_PATH.exec(url);
  if (pathMatch) return pathMatch[1];

  const arMatch = AR_ID.exec(url);
  if (arMatch) return arMatch[0];

  const paramMatch = ID_PARAM.exec(url);
  if (paramMatch) return paramMatch[1];

  return null;
}

/** First id in document order, whether it appears bare or inside an advertiser path. */
export function extractAdvertiserIdFromContent(html: string): string | null {
  for (const match of html.matchAll(CONTENT_ID)) {
    const id = match[1] ?? match[0];
    if (id) return id;
  }
  return null;
}
