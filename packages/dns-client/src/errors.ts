/**
 * DNS Client Errors
 *
 * Every failure surfaced by the client is a DnsError. The subclass tells the
 * caller where it happened: before the request (config, validation, encode),
 * on the wire (transport), or in the response (api, decode).
 */

import type { ZodIssue } from 'zod';

/** Base class for all client errors */
export class DnsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DnsError';
  }
}

/** Client construction rejected */
export class DnsConfigError extends DnsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DnsConfigError';
  }
}

/** Blank identifier or required field, raised before any request */
export class DnsValidationError extends DnsError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'DnsValidationError';
  }
}

/** Request body could not be serialized */
export class DnsEncodeError extends DnsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DnsEncodeError';
  }
}

/** fetch rejected: network failure, timeout or caller abort */
export class DnsTransportError extends DnsError {
  public readonly timedOut: boolean;
  public readonly aborted: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; timedOut?: boolean; aborted?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'DnsTransportError';
    this.timedOut = options.timedOut ?? false;
    this.aborted = options.aborted ?? false;
  }
}

/**
 * Non-success response from the API.
 *
 * `statusCode` always comes from the HTTP status line. `body` holds the raw
 * response text whether or not it parsed.
 */
export class DnsApiError extends DnsError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string | undefined,
    public readonly body: string
  ) {
    super(message);
    this.name = 'DnsApiError';
  }

  toString(): string {
    const code = this.code ? `, code=${this.code}` : '';
    return `${this.name}: ${this.message} (status=${this.statusCode}${code})`;
  }
}

/** Successful response whose body is not JSON or not the expected shape */
export class DnsDecodeError extends DnsError {
  constructor(
    message: string,
    public readonly body: string,
    public readonly issues: ZodIssue[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DnsDecodeError';
  }
}

/** Narrow an unknown error to a DnsApiError, optionally with a given status */
export function isDnsApiError(error: unknown, statusCode?: number): error is DnsApiError {
  if (!(error instanceof DnsApiError)) {
    return false;
  }
  return statusCode === undefined || error.statusCode === statusCode;
}
