#!/usr/bin/env node

/**
 * puppeteer-core never downloads a browser. This reports which Chrome the
 * scraper would launch and fails when there is none.
 */
import { existsSync } from 'node:fs';
import { detectChromePath } from '../browser/index.js';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';

function describeChrome(configuredPath: string | undefined): { ok: boolean; message: string } {
  if (configuredPath) {
    return existsSync(configuredPath)
      ? { ok: true, message: `Using CHROME_PATH: ${configuredPath}` }
      : { ok: false, message: `CHROME_PATH points to a missing file: ${configuredPath}` };
  }
  const detected = detectChromePath();
  if (detected) {
    return { ok: true, message: `Detected Chrome: ${detected}` };
  }
  return {
    ok: false,
    message: 'No Chrome or Chromium found. Install one and/or set CHROME_PATH to its executable.',
  };
}

function main() {
  const config = loadConfig();
  const log = createLogger(config);
  const result = describeChrome(config.browser.chromePath);
  if (result.ok) {
    log.info(result.message);
  } else {
    log.error(result.message);
    process.exitCode = 1;
  }
}

main();
