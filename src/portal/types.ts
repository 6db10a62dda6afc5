export interface VideoScan {
  /** Number of elements matched by `indicator`; 0 when the page reports no ads. */
  count: number;
  /** Selector that produced the count, `no-results-text`, or `none`. */
  indicator: string;
}

export interface SearchInputMatch {
  html: string;
  strategy: 'placeholder-span' | 'input-class' | 'search-role' | 'search-container' | 'selector' | 'first-input';
}

export interface PageAssets {
  tags: string[];
  imageUrls: string[];
}

export interface VideoReport {
  hasVideos: boolean;
  videoCount: number | null;
}

export interface AdvertiserReport extends VideoReport {
  advertiserId: string;
}

export interface SearchPageSnapshot {
  pageContent: string[];
  searchInput: string;
}

export interface AdvertiserAssets extends PageAssets {
  advertiserId: string;
}
