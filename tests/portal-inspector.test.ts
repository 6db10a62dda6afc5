import { describe, it, expect, vi } from 'vitest';
import { PortalInspector, NO_SEARCH_INPUT } from '../src/portal/PortalInspector.js';
import type { PageOptions } from '../src/browser/index.js';
import type { PortalPage } from '../src/portal/PortalPage.js';
import { FakePortalPage, type FakePageScript } from './helpers/fake-portal-page.js';

function setup(script: FakePageScript = {}) {
  const page = new FakePortalPage(script);
  const openPage = vi.fn(async (_options?: PageOptions): Promise<PortalPage> => page);
  const inspector = new PortalInspector(openPage, {
    portalUrl: 'https://portal.test/',
    region: 'US',
    navigationTimeout: 60000,
    waitTimeout: 30000,
  });
  return { page, openPage, inspector };
}

describe('PortalInspector', () => {
  describe('inspectSearchPage', () => {
    it('returns the page lines and the located search input', async () => {
      const { page, openPage, inspector } = setup({
        html: '<html>\n<body>\r\n</body></html>',
        searchInput: { html: '<input class="input input-area">', strategy: 'input-class' },
      });

      await expect(inspector.inspectSearchPage()).resolves.toEqual({
        pageContent: ['<html>', '<body>', '</body></html>'],
        searchInput: '<input class="input input-area">',
      });
      expect(openPage).toHaveBeenCalledWith({
        viewport: { width: 1280, height: 800 },
        timeout: 30000,
        navigationTimeout: 60000,
      });
      expect(page.gotoOptions).toEqual([{ waitUntil: 'networkidle0' }]);
      expect(page.screenshots).toEqual([]);
      expect(page.closed).toBe(true);
    });

    it('reports a missing search input and takes a screenshot', async () => {
      const { page, inspector } = setup({ searchInput: null });

      const snapshot = await inspector.inspectSearchPage();
      expect(snapshot.searchInput).toBe(NO_SEARCH_INPUT);
      expect(page.screenshots).toEqual(['search_input_not_found']);
    });

    it('wraps page errors', async () => {
      const { page, inspector } = setup({ failOn: { goto: new Error('net::ERR_NAME_NOT_RESOLVED') } });

      await expect(inspector.inspectSearchPage()).rejects.toThrow(
        'Error getting page content: net::ERR_NAME_NOT_RESOLVED',
      );
      expect(page.screenshots).toEqual(['error_screenshot']);
      expect(page.closed).toBe(true);
    });
  });

  describe('collectAdvertiserAssets', () => {
    it('collects tags and images from the advertiser page', async () => {
      const { page, inspector } = setup({
        assets: { tags: ['body', 'html', 'img'], imageUrls: ['https://cdn.test/creative.png'] },
      });

      await expect(inspector.collectAdvertiserAssets('AR1')).resolves.toEqual({
        advertiserId: 'AR1',
        tags: ['body', 'html', 'img'],
        imageUrls: ['https://cdn.test/creative.png'],
      });
      expect(page.callsTo('goto')).toEqual(['goto:https://portal.test/advertiser/AR1?region=US']);
      expect(page.gotoOptions).toEqual([{ waitUntil: 'networkidle0' }]);
      expect(page.closed).toBe(true);
    });
  });
});
