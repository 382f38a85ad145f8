/**
 * DNS Client
 *
 * TypeScript client for the DNS management API
 */

import { z } from 'zod';
import {
  DnsApiError,
  DnsDecodeError,
  DnsEncodeError,
  DnsTransportError,
  DnsValidationError,
} from './errors';
import { createClientLogger, type Logger } from './logger';
import { resolveConfig, type ClientOption, type DnsClientConfig } from './options';
import {
  ApiErrorBodySchema,
  BindImportResponseSchema,
  ClientProfileSchema,
  DomainSchema,
  NameserverCheckResponseSchema,
  RecordSchema,
  ZoneRecordSchema,
} from './types';
import type {
  BindImportResponse,
  ClientProfile,
  CreateRecordRequest,
  CreateZoneRecordRequest,
  DnsRecord,
  Domain,
  NameserverCheckResponse,
  QueryParams,
  UpdateRecordRequest,
  UpdateZoneRecordRequest,
  ZoneRecord,
} from './types';

const CLIENT_API_PREFIX = '/api/client';

/** Cap on JSON response bodies */
export const MAX_JSON_BODY_BYTES = 1 << 20;

/** Cap on zone file exports */
export const MAX_EXPORT_BODY_BYTES = 4 << 20;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Per-call options */
export interface RequestOptions {
  /** Aborts the request when signalled */
  signal?: AbortSignal;
}

/** Options for list calls */
export interface ListOptions extends RequestOptions {
  /** Filter or paging parameters, passed through as the query string */
  query?: QueryParams;
}

/** A request that has been built but not sent */
export interface PreparedRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  signal?: AbortSignal;
}

/**
 * DNS Client
 *
 * Maps the DNS management API onto typed async methods. A client only holds
 * its frozen configuration and can be shared freely.
 *
 * @example
 * ```typescript
 * const client = new DnsClient(process.env.DNS_API_KEY ?? '', withTimeout(5000));
 *
 * const domain = await client.createDomain('example.com');
 * await client.createRecord({
 *   domain_id: domain.id,
 *   name: 'www',
 *   type: 'A',
 *   value: '192.0.2.10',
 *   ttl: 300,
 * });
 *
 * const zoneFile = await client.exportBindZone(domain.id);
 * ```
 */
export class DnsClient {
  readonly config: DnsClientConfig;
  private readonly logger: Logger;

  constructor(apiKey: string, ...options: Array<ClientOption | undefined>) {
    this.config = resolveConfig(apiKey, options);
    this.logger = createClientLogger(this.config.logger, this.config.baseUrl);
  }

  // ==========================================================================
  // DOMAINS
  // ==========================================================================

  /**
   * List all domains owned by the authenticated client
   */
  async listDomains(options: ListOptions = {}): Promise<Domain[]> {
    const request = this.newRequest('GET', `${CLIENT_API_PREFIX}/domains`, options);
    return (await this.send(request, z.array(DomainSchema))) ?? [];
  }

  /**
   * Create a domain
   */
  async createDomain(name: string, options: RequestOptions = {}): Promise<Domain> {
    const domainName = requireValue(name, 'domain name');
    const request = this.newRequest('POST', `${CLIENT_API_PREFIX}/domains`, {
      body: { name: domainName },
      signal: options.signal,
    });
    return this.sendExpecting(request, DomainSchema);
  }

  /**
   * Delete a domain and its records
   */
  async deleteDomain(domainId: string, options: RequestOptions = {}): Promise<void> {
    const id = requireValue(domainId, 'domain id');
    await this.send(this.newRequest('DELETE', `${CLIENT_API_PREFIX}/domains/${segment(id)}`, options));
  }

  /**
   * Ask the API to verify the domain's delegation
   */
  async checkNameserver(domainId: string, options: RequestOptions = {}): Promise<NameserverCheckResponse> {
    const id = requireValue(domainId, 'domain id');
    const request = this.newRequest(
      'POST',
      `${CLIENT_API_PREFIX}/domains/${segment(id)}/check-nameserver`,
      options
    );
    return this.sendExpecting(request, NameserverCheckResponseSchema);
  }

  /**
   * List all records of a domain
   */
  async listDomainRecords(domainId: string, options: ListOptions = {}): Promise<DnsRecord[]> {
    const id = requireValue(domainId, 'domain id');
    const request = this.newRequest('GET', `${CLIENT_API_PREFIX}/domains/${segment(id)}/records`, options);
    return (await this.send(request, z.array(RecordSchema))) ?? [];
  }

  // ==========================================================================
  // ZONE FILES
  // ==========================================================================

  /**
   * Download a domain's records as a BIND zone file.
   *
   * Returns the bytes exactly as served; nothing is decoded.
   */
  async exportBindZone(domainId: string, options: RequestOptions = {}): Promise<Uint8Array> {
    const id = requireValue(domainId, 'domain id');
    const request = this.newRequest(
      'GET',
      `${CLIENT_API_PREFIX}/domains/${segment(id)}/export/bind`,
      options
    );
    request.headers['Accept'] = 'text/plain';
    return this.sendRaw(request, MAX_EXPORT_BODY_BYTES);
  }

  /**
   * Import records from a BIND zone file
   *
   * @param zoneData - zone file contents; strings are sent as UTF-8
   * @param contentType - defaults to text/plain
   */
  async importBindZone(
    zoneData: Uint8Array | string,
    contentType = 'text/plain',
    options: RequestOptions = {}
  ): Promise<BindImportResponse> {
    if (zoneData.length === 0) {
      throw new DnsValidationError('zone data must not be empty', 'zone data');
    }

    const request = this.newRequest('POST', `${CLIENT_API_PREFIX}/import/bind`, options);
    request.headers['Content-Type'] = contentType.trim() || 'text/plain';
    request.body = zoneData;
    return this.sendExpecting(request, BindImportResponseSchema);
  }

  // ==========================================================================
  // RECORDS
  // ==========================================================================

  /**
   * Create a record
   */
  async createRecord(payload: CreateRecordRequest, options: RequestOptions = {}): Promise<DnsRecord> {
    requireValue(payload.domain_id, 'domain id');
    requireValue(payload.name, 'record name');
    requireValue(payload.type, 'record type');
    requireValue(payload.value, 'record value');

    const request = this.newRequest('POST', `${CLIENT_API_PREFIX}/records`, {
      body: payload,
      signal: options.signal,
    });
    return this.sendExpecting(request, RecordSchema);
  }

  /**
   * Update a record. Only the properties set on `updates` are sent.
   */
  async updateRecord(
    recordId: string,
    updates: UpdateRecordRequest,
    options: RequestOptions = {}
  ): Promise<DnsRecord> {
    const id = requireValue(recordId, 'record id');
    const request = this.newRequest('PUT', `${CLIENT_API_PREFIX}/records/${segment(id)}`, {
      body: updates,
      signal: options.signal,
    });
    return this.sendExpecting(request, RecordSchema);
  }

  /**
   * Delete a record
   */
  async deleteRecord(recordId: string, options: RequestOptions = {}): Promise<void> {
    const id = requireValue(recordId, 'record id');
    await this.send(this.newRequest('DELETE', `${CLIENT_API_PREFIX}/records/${segment(id)}`, options));
  }

  // ==========================================================================
  // ZONE-SCOPED RECORDS
  // ==========================================================================

  /**
   * List records of a zone. The zone is addressed by name; a trailing dot is ignored.
   */
  async listZoneRecords(zone: string, options: ListOptions = {}): Promise<ZoneRecord[]> {
    const request = this.newRequest('GET', zoneRecordsPath(zone), options);
    return (await this.send(request, z.array(ZoneRecordSchema))) ?? [];
  }

  /**
   * Create a record in a zone
   */
  async createZoneRecord(
    zone: string,
    payload: CreateZoneRecordRequest,
    options: RequestOptions = {}
  ): Promise<ZoneRecord> {
    const path = zoneRecordsPath(zone);
    requireValue(payload.name, 'record name');
    requireValue(payload.type, 'record type');
    requireValue(payload.content, 'record content');

    const request = this.newRequest('POST', path, { body: payload, signal: options.signal });
    return this.sendExpecting(request, ZoneRecordSchema);
  }

  /**
   * Patch a record in a zone. Only the properties set on `updates` are sent.
   */
  async updateZoneRecord(
    zone: string,
    recordId: string,
    updates: UpdateZoneRecordRequest,
    options: RequestOptions = {}
  ): Promise<ZoneRecord> {
    const path = zoneRecordsPath(zone);
    const id = requireValue(recordId, 'record id');
    const request = this.newRequest('PATCH', `${path}/${segment(id)}`, {
      body: updates,
      signal: options.signal,
    });
    return this.sendExpecting(request, ZoneRecordSchema);
  }

  /**
   * Delete a record from a zone
   */
  async deleteZoneRecord(zone: string, recordId: string, options: RequestOptions = {}): Promise<void> {
    const path = zoneRecordsPath(zone);
    const id = requireValue(recordId, 'record id');
    await this.send(this.newRequest('DELETE', `${path}/${segment(id)}`, options));
  }

  // ==========================================================================
  // ACCOUNT
  // ==========================================================================

  /**
   * Rotate the API key.
   *
   * The returned profile carries the new token. This client keeps using the
   * key it was built with, which the API no longer accepts; build a new client
   * from `api_token`.
   */
  async rotateApiKey(options: RequestOptions = {}): Promise<ClientProfile> {
    const request = this.newRequest('POST', `${CLIENT_API_PREFIX}/rotate-api-key`, options);
    return this.sendExpecting(request, ClientProfileSchema);
  }

  // ==========================================================================
  // REQUESTS
  // ==========================================================================

  /**
   * Build an authenticated request without sending it.
   *
   * `path` is resolved against the base URL as a relative reference, so a
   * leading slash replaces the base URL's path.
   */
  newRequest(
    method: HttpMethod,
    path: string,
    options: { query?: QueryParams; body?: unknown; signal?: AbortSignal } = {}
  ): PreparedRequest {
    const url = new URL(path, this.config.baseUrl);
    if (options.query) {
      const search = encodeQuery(options.query);
      if (search) {
        url.search = search;
      }
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
      Accept: 'application/json',
    };
    if (this.config.userAgent) {
      headers['User-Agent'] = this.config.userAgent;
    }

    const request: PreparedRequest = { method, url, headers, signal: options.signal };

    if (options.body !== undefined) {
      request.body = encodeJson(options.body);
      headers['Content-Type'] = 'application/json';
    }

    return request;
  }

  /**
   * Send a request and decode its JSON body with `schema`.
   *
   * Resolves to undefined when no schema is given or the body is empty.
   */
  async send<T>(
    request: PreparedRequest,
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | undefined> {
    const body = await this.execute(request, MAX_JSON_BODY_BYTES);
    if (!schema || body.length === 0) {
      return undefined;
    }

    const text = decodeText(body);
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new DnsDecodeError('decode response: body is not valid JSON', text, [], { cause: error });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new DnsDecodeError(
        `decode response: ${issue?.message ?? 'unexpected shape'}${where}`,
        text,
        result.error.issues
      );
    }
    return result.data;
  }

  /**
   * Send a request and return the body bytes without decoding
   */
  async sendRaw(request: PreparedRequest, maxBytes = MAX_JSON_BODY_BYTES): Promise<Uint8Array> {
    return this.execute(request, maxBytes);
  }

  private async sendExpecting<T>(
    request: PreparedRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const result = await this.send(request, schema);
    if (result === undefined) {
      throw new DnsDecodeError('decode response: empty response body', '');
    }
    return result;
  }

  private async execute(request: PreparedRequest, maxBytes: number): Promise<Uint8Array> {
    const url = request.url.toString();
    const fetchFn = this.config.fetch;
    const startedAt = Date.now();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);

    const callerSignal = request.signal;
    const onCallerAbort = (): void => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    this.logger.debug({ method: request.method, url }, 'dns api request');

    try {
      const response = await fetchFn(url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await readBody(response, maxBytes);

      this.logger.debug(
        { method: request.method, url, status: response.status, durationMs: Date.now() - startedAt },
        'dns api response'
      );

      if (response.status >= 400) {
        throw toApiError(response.status, response.statusText, body);
      }
      return body;
    } catch (error) {
      if (error instanceof DnsApiError) {
        throw error;
      }

      this.logger.debug({ method: request.method, url, err: error }, 'dns api request failed');

      if (timedOut) {
        throw new DnsTransportError(`request timed out after ${this.config.timeout}ms`, {
          cause: error,
          timedOut: true,
        });
      }
      if (callerSignal?.aborted) {
        throw new DnsTransportError('request aborted', { cause: error, aborted: true });
      }
      throw new DnsTransportError(
        `request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Trim a required string and reject it when blank */
function requireValue(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new DnsValidationError(`${field} must not be empty`, field);
  }
  return trimmed;
}

/** Zone names are trailing-dot-insensitive */
function zoneRecordsPath(zone: string): string {
  const name = requireValue(zone.trim().replace(/\.+$/, ''), 'zone');
  return `/zones/${segment(name)}/records`;
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

function encodeQuery(query: QueryParams): string {
  const params = new URLSearchParams();
  for (const key of Object.keys(query).sort()) {
    const value = query[key];
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  return params.toString();
}

function encodeJson(body: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    throw new DnsEncodeError(
      `encode request body: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  if (encoded === undefined) {
    throw new DnsEncodeError(`encode request body: ${typeof body} is not serializable`);
  }
  return encoded;
}

function decodeText(body: Uint8Array): string {
  return new TextDecoder().decode(body);
}

/** Read at most `maxBytes` of the body; the rest is discarded */
async function readBody(response: Response, maxBytes: number): Promise<Uint8Array> {
  if (!response.body) {
    return new Uint8Array(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  try {
    while (size < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      const chunk = value.byteLength > maxBytes - size ? value.subarray(0, maxBytes - size) : value;
      chunks.push(chunk);
      size += chunk.byteLength;
    }
    if (size >= maxBytes) {
      await reader.cancel();
    }
  } finally {
    reader.releaseLock();
  }

  const body = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

function toApiError(status: number, statusText: string, body: Uint8Array): DnsApiError {
  const text = decodeText(body);
  const trimmed = text.trim();

  let message = '';
  let code: string | undefined;
  if (trimmed !== '') {
    const parsed = ApiErrorBodySchema.safeParse(parseJsonOrUndefined(trimmed));
    if (parsed.success) {
      message = parsed.data.message ?? '';
      code = parsed.data.code || undefined;
    } else {
      message = trimmed;
    }
  }

  if (message === '') {
    message = statusText || `Request failed with status ${status}`;
  }
  return new DnsApiError(message, status, code, text);
}

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
