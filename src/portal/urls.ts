export type AdFormat = 'VIDEO' | 'IMAGE' | 'TEXT';

export interface AdvertiserPageParams {
  region: string;
  format?: AdFormat;
}

/** `<portal>/advertiser/<id>?region=<region>[&format=<format>]` */
export function advertiserPageUrl(portalUrl: string, advertiserId: string, params: AdvertiserPageParams): string {
  const base = portalUrl.endsWith('/') ? portalUrl : `${portalUrl}/`;
  const url = new URL(`advertiser/${encodeURIComponent(advertiserId)}`, base);
  url.searchParams.set('region', params.region);
  if (params.format) url.searchParams.set('format', params.format);
  return url.toString();
}
