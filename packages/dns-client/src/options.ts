/**
 * DNS Client Configuration
 *
 * A client is built from an API key and a list of options applied in order to
 * a draft configuration. The first option that throws aborts construction.
 */

import { DnsConfigError } from './errors';
import { createSilentLogger, type Logger } from './logger';

/** Production API endpoint */
export const DEFAULT_BASE_URL = 'https://api.ns.enzonix.com';

/** Request timeout in milliseconds */
export const DEFAULT_TIMEOUT = 10_000;

export const DEFAULT_USER_AGENT = 'dns-client-ts/0.1.0';

/** Resolved client configuration; frozen once the client exists */
export interface DnsClientConfig {
  readonly apiKey: string;
  /** Absolute URL request paths are resolved against, in normalized form */
  readonly baseUrl: string;
  /** Transport used for every request */
  readonly fetch: typeof fetch;
  /** Sent as User-Agent when non-empty */
  readonly userAgent: string;
  /** Per-request timeout in milliseconds */
  readonly timeout: number;
  readonly logger: Logger;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** One construction step; throws DnsConfigError to reject */
export type ClientOption = (config: Mutable<DnsClientConfig>) => void;

/** Override the API base URL. Must be absolute. */
export function withBaseUrl(rawUrl: string): ClientOption {
  return (config) => {
    if (rawUrl.trim() === '') {
      throw new DnsConfigError('base url must not be empty');
    }
    let parsed: URL;
    try {
      parsed = new URL(rawUrl);
    } catch (error) {
      throw new DnsConfigError(`base url must be absolute: ${rawUrl}`, { cause: error });
    }
    config.baseUrl = parsed.href;
  };
}

/** Use a custom fetch implementation */
export function withFetch(fetchFn: typeof fetch): ClientOption {
  return (config) => {
    if (typeof fetchFn !== 'function') {
      throw new DnsConfigError('fetch implementation must be a function');
    }
    config.fetch = fetchFn;
  };
}

/** Override the User-Agent header; an empty value suppresses it */
export function withUserAgent(userAgent: string): ClientOption {
  return (config) => {
    config.userAgent = userAgent.trim();
  };
}

/** Override the request timeout (milliseconds) */
export function withTimeout(timeout: number): ClientOption {
  return (config) => {
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new DnsConfigError(`timeout must be a positive number of milliseconds, got ${timeout}`);
    }
    config.timeout = timeout;
  };
}

/** Send request/response debug records to this logger */
export function withLogger(logger: Logger): ClientOption {
  return (config) => {
    config.logger = logger;
  };
}

/**
 * Build a frozen configuration from an API key and options.
 * Undefined entries are skipped so options can be composed conditionally.
 */
export function resolveConfig(
  apiKey: string,
  options: ReadonlyArray<ClientOption | undefined>
): DnsClientConfig {
  const draft: Mutable<DnsClientConfig> = {
    apiKey,
    baseUrl: new URL(DEFAULT_BASE_URL).href,
    fetch: globalThis.fetch,
    userAgent: DEFAULT_USER_AGENT,
    timeout: DEFAULT_TIMEOUT,
    logger: createSilentLogger(),
  };

  for (const option of options) {
    option?.(draft);
  }

  // options may replace the key
  if (draft.apiKey.trim() === '') {
    throw new DnsConfigError('api key must not be empty');
  }

  return Object.freeze(draft);
}
