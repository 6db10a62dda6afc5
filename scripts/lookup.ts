/**
 * Sends advertiser names to a running scraper's /scrape endpoint and prints the results.
 * Usage: tsx scripts/lookup.ts [--base http://localhost:9001] adidas Google AR14017378248766259201
 */

import { parseArgs } from 'node:util';

const { values, positionals } = parseArgs({
  options: {
    base: { type: 'string', default: 'http://localhost:9001' },
  },
  allowPositionals: true,
});

async function lookup(advertiserName: string): Promise<void> {
  console.log(`\nTesting with advertiser: ${advertiserName}`);
  try {
    const response = await fetch(`${values.base}/scrape`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ advertiser_name: advertiserName }),
      // 抓取流程较慢
      signal: AbortSignal.timeout(120000),
    });
    console.log(`Response status: ${response.status}`);
    const data: unknown = await response.json();
    console.log(JSON.stringify(data, null, 2));

    if (response.ok && typeof data === 'object' && data !== null && 'has_videos' in data) {
      const videoCount = 'video_count' in data ? data.video_count : null;
      console.log(data.has_videos ? `${advertiserName} has ${videoCount} videos` : `${advertiserName} has no videos`);
    }
  } catch (err) {
    console.log(`Request failed for ${advertiserName}:`, err);
  }
}

async function main() {
  const names = positionals.length > 0 ? positionals : ['adidas'];
  for (const name of names) {
    await lookup(name);
  }
}

main().catch(console.error);
