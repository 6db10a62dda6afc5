// @vitest-environment jsdom
import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  clickFirstSearchResult,
  collectPageAssets,
  findAdvertiserIdCandidates,
  locateSearchInput,
  scanVideoIndicators,
} from '../src/portal/page-scripts.js';

function render(html: string): void {
  document.body.innerHTML = html;
}

beforeEach(() => {
  render('');
});

describe('locateSearchInput', () => {
  it('prefers the input next to the placeholder text', () => {
    render(`
      <input class="search-field" name="other">
      <div><span>Search by advertiser or website name</span><input class="input input-area"></div>
    `);
    expect(locateSearchInput()).toEqual({
      html: '<input class="input input-area">',
      strategy: 'placeholder-span',
    });
  });

  it('then an input whose class hints at search', () => {
    render('<div role="search"><input name="q"></div><input class="query-box" name="brand">');
    expect(locateSearchInput()).toEqual({
      html: '<input class="query-box" name="brand">',
      strategy: 'input-class',
    });
  });

  it('then an input inside a search role', () => {
    render('<div role="search"><input name="q"></div>');
    expect(locateSearchInput()).toEqual({ html: '<input name="q">', strategy: 'search-role' });
  });

  it('accepts an input that carries the role itself', () => {
    render('<input role="combobox" name="q">');
    expect(locateSearchInput()).toEqual({
      html: '<input role="combobox" name="q">',
      strategy: 'search-role',
    });
  });

  it('then an input in a container that mentions finding', () => {
    render('<form><label>Find a brand</label><input name="brand"></form>');
    expect(locateSearchInput()).toEqual({ html: '<input name="brand">', strategy: 'search-container' });
  });

  it('then the fixed selector list', () => {
    render('<input name="email"><input type="search" name="q">');
    expect(locateSearchInput()).toEqual({ html: '<input type="search" name="q">', strategy: 'selector' });
  });

  it('then the first input on the page', () => {
    render('<input name="email"><input name="phone">');
    expect(locateSearchInput()).toEqual({ html: '<input name="email">', strategy: 'first-input' });
  });

  it('returns null without any input', () => {
    render('<p>Nothing to type into</p>');
    expect(locateSearchInput()).toBeNull();
  });
});

describe('findAdvertiserIdCandidates', () => {
  it('lists ids near the name before attributed ids', () => {
    render(`
      <div><span>Acme Corp</span> AR111</div>
      <div data-advertiser-id="AR222"></div>
      <div data-id="row-7"></div>
      <div data-id="AR333"></div>
      <div id="advertiser-AR444"></div>
    `);
    // body, the wrapping div and the span all contain the name
    expect(findAdvertiserIdCandidates('acme')).toEqual(['AR111', 'AR111', 'AR111', 'AR222', 'AR333', 'AR444']);
  });

  it('takes a name with quotes as plain text', () => {
    render(`<div><span>O'Brien "Co"</span> AR555</div>`);
    expect(findAdvertiserIdCandidates(`O'Brien "Co"`)).toEqual(['AR555', 'AR555', 'AR555']);
  });

  it('only reads attributes for an empty name', () => {
    render('<div><span>Acme</span> AR111</div><div data-advertiser-id="AR222"></div>');
    expect(findAdvertiserIdCandidates('')).toEqual(['AR222']);
  });
});

describe('scanVideoIndicators', () => {
  it('counts video elements first', () => {
    render('<div class="video-tile"></div><video></video><video></video>');
    expect(scanVideoIndicators()).toEqual({ count: 2, indicator: 'video' });
  });

  it('counts embedded players', () => {
    render('<iframe src="https://www.youtube.com/embed/test"></iframe>');
    expect(scanVideoIndicators()).toEqual({ count: 1, indicator: 'iframe[src*="youtube"]' });
  });

  it('recognizes the no-results message', () => {
    render('<p>No ads found</p><div class="ad-card"></div>');
    expect(scanVideoIndicators()).toEqual({ count: 0, indicator: 'no-results-text' });
  });

  it('falls back to counting ad containers', () => {
    render('<div class="ad-card"></div><div class="ad-card"></div>');
    expect(scanVideoIndicators()).toEqual({
      count: 2,
      indicator: 'div[class*="ad"], div[id*="ad"], div[aria-label*="ad"]',
    });
  });

  it('reports none on an empty page', () => {
    render('<p>Hello</p>');
    expect(scanVideoIndicators()).toEqual({ count: 0, indicator: 'none' });
  });
});

describe('clickFirstSearchResult', () => {
  it('clicks the first listbox option', () => {
    render('<div role="listbox"><div role="option" id="first">Acme</div><div role="option">Other</div></div>');
    const onClick = vi.fn();
    document.getElementById('first')?.addEventListener('click', onClick);

    expect(clickFirstSearchResult()).toBe("div[role='listbox'] div[role='option']");
    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it('falls back to elements whose class looks like a result', () => {
    render('<ul><li class="brand-result" id="hit">Acme</li></ul>');
    const onClick = vi.fn();
    document.getElementById('hit')?.addEventListener('click', onClick);

    expect(clickFirstSearchResult()).toBe('*[class*="result"]');
    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it('returns null when there is nothing to click', () => {
    render('<p>No matches</p>');
    expect(clickFirstSearchResult()).toBeNull();
  });
});

describe('collectPageAssets', () => {
  it('lists sorted tag names and non-inline image URLs', () => {
    render(`
      <img src="https://cdn.test/creative.png">
      <img src="data:image/gif;base64,R0lGODlhAQABAAAAACw=">
      <img alt="no source">
    `);
    expect(collectPageAssets()).toEqual({
      tags: ['body', 'head', 'html', 'img'],
      imageUrls: ['https://cdn.test/creative.png'],
    });
  });
});
