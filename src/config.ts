import type { FeedChannel } from './types.js';

export interface BrowserOptions {
  headless: boolean;
  navigationTimeoutMs: number;
  settleMs: number;
  scrollSettleMs: number;
  scrollBackSettleMs: number;
  userAgent: string;
}

export interface FeedConfig {
  orgName: string;
  careersUrl: string;
  baseDomain: string;
  relativeLinkBase: string;
  defaultLocation: string;
  locationHints: string[];
  outputPath: string;
  feedUrl: string;
  logDir: string;
  maxCandidates: number;
  browser: BrowserOptions;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: FeedConfig = {
  orgName: 'World Bank Group',
  careersUrl: 'https://worldbankgroup.csod.com/ux/ats/careersite/1/home?c=worldbankgroup',
  baseDomain: 'https://worldbankgroup.csod.com',
  relativeLinkBase: 'https://worldbankgroup.csod.com/ux/ats/careersite/1',
  defaultLocation: 'World Bank Group',
  locationHints: ['Washington', 'DC', 'Remote', 'Location:'],
  outputPath: 'worldbank_jobs.xml',
  feedUrl: 'https://cinfoposte.github.io/worldbank-jobs/worldbank_jobs.xml',
  logDir: 'logs',
  maxCandidates: 50,
  browser: {
    headless: true,
    navigationTimeoutMs: 60000,
    settleMs: 20000,
    scrollSettleMs: 3000,
    scrollBackSettleMs: 2000,
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  },
};

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  return fallback;
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

export function loadConfig(env: Env = process.env): FeedConfig {
  const baseDomain = stripTrailingSlash(readString(env, 'FEED_BASE_DOMAIN', DEFAULT_CONFIG.baseDomain));
  const baseOverridden = Boolean(env.FEED_BASE_DOMAIN?.trim());

  return {
    orgName: readString(env, 'FEED_ORG_NAME', DEFAULT_CONFIG.orgName),
    careersUrl: readString(env, 'FEED_CAREERS_URL', DEFAULT_CONFIG.careersUrl),
    baseDomain,
    relativeLinkBase: stripTrailingSlash(
      readString(env, 'FEED_RELATIVE_BASE', baseOverridden ? baseDomain : DEFAULT_CONFIG.relativeLinkBase),
    ),
    defaultLocation: readString(env, 'FEED_DEFAULT_LOCATION', DEFAULT_CONFIG.defaultLocation),
    locationHints: [...DEFAULT_CONFIG.locationHints],
    outputPath: readString(env, 'FEED_OUTPUT_PATH', DEFAULT_CONFIG.outputPath),
    feedUrl: readString(env, 'FEED_SELF_URL', DEFAULT_CONFIG.feedUrl),
    logDir: readString(env, 'FEED_LOG_DIR', DEFAULT_CONFIG.logDir),
    maxCandidates: DEFAULT_CONFIG.maxCandidates,
    browser: {
      ...DEFAULT_CONFIG.browser,
      headless: readBoolean(env, 'FEED_HEADLESS', DEFAULT_CONFIG.browser.headless),
      settleMs: readPositiveInt(env, 'FEED_SETTLE_MS', DEFAULT_CONFIG.browser.settleMs),
    },
  };
}

export function channelFromConfig(config: FeedConfig): FeedChannel {
  return {
    title: `${config.orgName} Jobs`,
    link: config.careersUrl,
    description: `Job listings from ${config.orgName}`,
    language: 'en-us',
    feedUrl: config.feedUrl,
    baseUrl: config.baseDomain,
  };
}
