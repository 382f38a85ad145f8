import pino, { type Logger } from 'pino';

/** Logger used when the caller does not supply one: the client stays quiet */
export function createSilentLogger(): Logger {
  return pino({ name: 'dns-client', level: 'silent' });
}

/** Child logger scoped to one client instance */
export function createClientLogger(parent: Logger, baseUrl: string): Logger {
  return parent.child({ module: 'dns-client', host: new URL(baseUrl).host });
}

export type { Logger };
