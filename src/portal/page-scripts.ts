/**
 * Functions evaluated inside the portal page through `page.evaluate`.
 * Each one is serialized on its own, so nothing here may reference
 * module scope: constants live inside the function bodies and inputs
 * arrive as arguments.
 */
import type { PageAssets, SearchInputMatch, VideoScan } from './types.js';

export function clickFirstSearchResult(): string | null {
  const selectors = [
    'material-list material-list-item',
    "div[role='listbox'] div[role='option']",
    '.search-results-container .search-result',
    "[role='list'] [role='listitem']",
    "[role='tab']",
    'material-list-item',
  ];
  const classPatterns = ['result', 'item', 'option', 'listitem'];
  const candidates = selectors.concat(classPatterns.map((pattern) => `*[class*="${pattern}"]`));

  for (const selector of candidates) {
    const element = document.querySelector(selector);
    if (element instanceof HTMLElement) {
      element.click();
      return selector;
    }
  }
  return null;
}

export function findAdvertiserIdCandidates(advertiserName: string): string[] {
  const name = advertiserName.toLowerCase();
  const arPattern = /AR\d+/;
  const candidates: string[] = [];

  if (name) {
    for (const element of Array.from(document.querySelectorAll('*'))) {
      const text = element.textContent;
      if (!text || !text.toLowerCase().includes(name)) continue;
      const parentText = element.parentElement?.textContent;
      const match = parentText ? arPattern.exec(parentText) : null;
      if (match) candidates.push(match[0]);
    }
  }

  const attributed = document.querySelectorAll('[data-advertiser-id], [data-id], [id*="advertiser"]');
  for (const element of Array.from(attributed)) {
    const advertiserId = element.getAttribute('data-advertiser-id');
    const dataId = element.getAttribute('data-id');
    if (advertiserId) {
      candidates.push(advertiserId);
    } else if (dataId && arPattern.test(dataId)) {
      candidates.push(dataId);
    } else if (element.id.includes('advertiser')) {
      const match = arPattern.exec(element.id);
      if (match) candidates.push(match[0]);
    }
  }

  return candidates;
}

export function scanVideoIndicators(): VideoScan {
  const selectors = [
    'video',
    'iframe[src*="youtube"]',
    'iframe[src*="vimeo"]',
    'div[role="region"][aria-label*="carousel"]',
    '.video-container',
    'div[class*="video"]',
    'div[id*="video"]',
    'div[class*="carousel"]',
    'div[class*="slider"]',
  ];
  for (const selector of selectors) {
    const count = document.querySelectorAll(selector).length;
    if (count > 0) return { count, indicator: selector };
  }

  const noVideoTexts = ['no video ads', 'no videos', 'no ads found', 'no results', 'no ads to show'];
  const pageText = (document.body?.textContent ?? '').toLowerCase();
  if (noVideoTexts.some((text) => pageText.includes(text))) {
    return { count: 0, indicator: 'no-results-text' };
  }

  const adSelector = 'div[class*="ad"], div[id*="ad"], div[aria-label*="ad"]';
  const adCount = document.querySelectorAll(adSelector).length;
  return adCount > 0 ? { count: adCount, indicator: adSelector } : { count: 0, indicator: 'none' };
}

export function locateSearchInput(): SearchInputMatch | null {
  const placeholder = 'Search by advertiser or website name';
  for (const span of Array.from(document.querySelectorAll('span'))) {
    if (!span.textContent?.includes(placeholder)) continue;
    const input = span.parentElement?.querySelector('input');
    if (input) return { html: input.outerHTML, strategy: 'placeholder-span' };
  }

  const classHints = ['search', 'query', 'input-area'];
  for (const input of Array.from(document.querySelectorAll('input'))) {
    const className = input.getAttribute('class') ?? '';
    if (classHints.some((hint) => className.includes(hint))) {
      return { html: input.outerHTML, strategy: 'input-class' };
    }
  }

  for (const element of Array.from(document.querySelectorAll('[role="search"], [role="searchbox"], [role="combobox"]'))) {
    const input = element instanceof HTMLInputElement ? element : element.querySelector('input');
    if (input) return { html: input.outerHTML, strategy: 'search-role' };
  }

  for (const word of ['search', 'find', 'lookup']) {
    for (const container of Array.from(document.querySelectorAll('div, section, form'))) {
      if (!(container.textContent ?? '').toLowerCase().includes(word)) continue;
      const input = container.querySelector('input');
      if (input) return { html: input.outerHTML, strategy: 'search-container' };
    }
  }

  const selectors = [
    'input[type="search"]',
    'input[placeholder*="search" i]',
    'input[placeholder*="find" i]',
    'input[aria-label*="search" i]',
    'input.search',
    'input.searchbox',
    'input.query',
    'input.input-area',
    'input[role="search"]',
    'input[role="searchbox"]',
  ];
  for (const selector of selectors) {
    const input = document.querySelector(selector);
    if (input) return { html: input.outerHTML, strategy: 'selector' };
  }

  const first = document.querySelector('input');
  return first ? { html: first.outerHTML, strategy: 'first-input' } : null;
}

export function collectPageAssets(): PageAssets {
  const tags = new Set<string>();
  for (const element of Array.from(document.querySelectorAll('*'))) {
    tags.add(element.tagName.toLowerCase());
  }

  const imageUrls: string[] = [];
  for (const image of Array.from(document.images)) {
    const src = image.getAttribute('src');
    if (!src) continue;
    // `image.src` is already resolved against the document URL
    if (image.src.startsWith('data:')) continue;
    imageUrls.push(image.src);
  }

  return { tags: Array.from(tags).sort(), imageUrls };
}
