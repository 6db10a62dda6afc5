import type { KeyInput } from 'puppeteer-core';
import type { GotoOptions, PortalPage } from '../../src/portal/PortalPage.js';
import type { PageAssets, SearchInputMatch, VideoScan } from '../../src/portal/types.js';

export type PortalPageMethod = keyof PortalPage;

export interface FakePageScript {
  /** Successive `currentUrl()` results; the last one repeats. */
  urls?: string[];
  /** Selectors `waitForSelector` finds. */
  selectors?: string[];
  html?: string;
  clickResult?: string | null;
  candidates?: string[];
  videoScan?: VideoScan;
  searchInput?: SearchInputMatch | null;
  assets?: PageAssets;
  failOn?: Partial<Record<PortalPageMethod, Error>>;
}

/** Records every call as `method` or `method:detail` and answers from the script. */
export class FakePortalPage implements PortalPage {
  readonly calls: string[] = [];
  readonly gotoOptions: GotoOptions[] = [];
  readonly screenshots: string[] = [];
  closed = false;
  private urlIndex = 0;

  constructor(private readonly script: FakePageScript = {}) {}

  private record(method: PortalPageMethod, detail?: string): void {
    this.calls.push(detail === undefined ? method : `${method}:${detail}`);
    const failure = this.script.failOn?.[method];
    if (failure) throw failure;
  }

  callsTo(method: PortalPageMethod): string[] {
    return this.calls.filter((call) => call === method || call.startsWith(`${method}:`));
  }

  async goto(url: string, options: GotoOptions = {}): Promise<void> {
    this.record('goto', url);
    this.gotoOptions.push(options);
  }

  async waitForDomReady(): Promise<void> {
    this.record('waitForDomReady');
  }

  async waitForSelector(selector: string): Promise<boolean> {
    this.record('waitForSelector', selector);
    return (this.script.selectors ?? []).includes(selector);
  }

  async click(selector: string): Promise<void> {
    this.record('click', selector);
  }

  async fill(selector: string, value: string): Promise<void> {
    this.record('fill', `${selector}=${value}`);
  }

  async press(key: KeyInput): Promise<void> {
    this.record('press', key);
  }

  async type(text: string): Promise<void> {
    this.record('type', text);
  }

  async pause(ms: number): Promise<void> {
    this.record('pause', String(ms));
  }

  async currentUrl(): Promise<string> {
    this.record('currentUrl');
    const urls = this.script.urls ?? ['https://portal.test/'];
    const url = urls[Math.min(this.urlIndex, urls.length - 1)];
    this.urlIndex++;
    return url;
  }

  async content(): Promise<string> {
    this.record('content');
    return this.script.html ?? '<html><body></body></html>';
  }

  async clickFirstSearchResult(): Promise<string | null> {
    this.record('clickFirstSearchResult');
    return this.script.clickResult ?? null;
  }

  async findAdvertiserIdCandidates(advertiserName: string): Promise<string[]> {
    this.record('findAdvertiserIdCandidates', advertiserName);
    return this.script.candidates ?? [];
  }

  async scanVideoIndicators(): Promise<VideoScan> {
    this.record('scanVideoIndicators');
    return this.script.videoScan ?? { count: 0, indicator: 'none' };
  }

  async locateSearchInput(): Promise<SearchInputMatch | null> {
    this.record('locateSearchInput');
    return this.script.searchInput ?? null;
  }

  async collectPageAssets(): Promise<PageAssets> {
    this.record('collectPageAssets');
    return this.script.assets ?? { tags: [], imageUrls: [] };
  }

  async screenshot(name: string): Promise<void> {
    this.screenshots.push(name);
    this.record('screenshot', name);
  }

  async close(): Promise<void> {
    this.record('close');
    this.closed = true;
  }
}
