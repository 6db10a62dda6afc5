/**
 * Checks that a running scraper answers on /ping.
 * Usage: tsx scripts/ping.ts [--host localhost] [--port 9001]
 */

import { parseArgs } from 'node:util';

const { values } = parseArgs({
  options: {
    host: { type: 'string', default: 'localhost' },
    port: { type: 'string', default: '9001' },
  },
});

async function main(): Promise<boolean> {
  const url = `http://${values.host}:${values.port}/ping`;
  console.log(`Testing connection to: ${url}`);

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(5000) });
    console.log(`Status code: ${response.status}`);
    if (!response.ok) {
      console.log(`Server returned status code ${response.status}: ${await response.text()}`);
      return false;
    }
    console.log('Server is running');
    console.log(JSON.stringify(await response.json(), null, 2));
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      console.log('Request timed out');
    } else {
      console.log('Connection error: the server is not running or not reachable', err);
    }
    return false;
  }
}

main()
  .then((ok) => process.exit(ok ? 0 : 1))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
