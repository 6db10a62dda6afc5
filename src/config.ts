import { z } from 'zod';

const DEFAULT_PORTAL_URL = 'https://adstransparency.google.com/';

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, received "${value}"` });
      return z.NEVER;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(9001),
  PORTAL_URL: z.string().url().default(DEFAULT_PORTAL_URL),
  REGION: z.string().regex(/^[A-Za-z]{2}$/, 'Expected a two-letter region code').default('US'),
  NAVIGATION_TIMEOUT: positiveInt(60000),
  WAIT_TIMEOUT: positiveInt(30000),
  SEARCH_TIMEOUT: positiveInt(90000),
  VIDEO_TIMEOUT: positiveInt(60000),
  VIDEO_NAVIGATION_TIMEOUT: positiveInt(45000),
  CHROME_PATH: optionalString,
  HEADLESS: flag(true),
  PROXY_SERVER: optionalString,
  SCREENSHOT_DIR: z.string().min(1).default('screenshots'),
  SCREENSHOTS: flag(true),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_FILE: optionalString,
});

export interface AppConfig {
  server: { host: string; port: number };
  portal: { url: string; region: string };
  timeouts: {
    navigation: number;
    wait: number;
    search: number;
    video: number;
    videoNavigation: number;
  };
  browser: { chromePath?: string; headless: boolean; proxyServer?: string };
  screenshots: { enabled: boolean; dir: string };
  log: { level: string; file?: string };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the service configuration from environment variables.
 * Empty strings count as unset so that `.env`-style blanks fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = result.data;

  return {
    server: { host: e.HOST, port: e.PORT },
    portal: { url: e.PORTAL_URL, region: e.REGION.toUpperCase() },
    timeouts: {
      navigation: e.NAVIGATION_TIMEOUT,
      wait: e.WAIT_TIMEOUT,
      search: e.SEARCH_TIMEOUT,
      video: e.VIDEO_TIMEOUT,
      videoNavigation: e.VIDEO_NAVIGATION_TIMEOUT,
    },
    browser: {
      chromePath: e.CHROME_PATH,
      headless: e.HEADLESS,
      proxyServer: e.PROXY_SERVER,
    },
    screenshots: { enabled: e.SCREENSHOTS, dir: e.SCREENSHOT_DIR },
    log: { level: e.LOG_LEVEL, file: e.LOG_FILE },
  };
}
