/**
 * DNS Client
 *
 * TypeScript client for the DNS management API
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { DnsClient, withTimeout, isDnsApiError } from 'dns-client';
 *
 * const client = new DnsClient('my-api-key', withTimeout(5000));
 *
 * // List domains
 * const domains = await client.listDomains();
 *
 * // Add a record
 * await client.createRecord({
 *   domain_id: domains[0].id,
 *   name: 'www',
 *   type: 'A',
 *   value: '192.0.2.10',
 *   ttl: 300,
 * });
 *
 * // Tell "not found" apart from other failures
 * try {
 *   await client.deleteRecord('record-1');
 * } catch (error) {
 *   if (!isDnsApiError(error, 404)) throw error;
 * }
 * ```
 */

// Export client
export { DnsClient, MAX_JSON_BODY_BYTES, MAX_EXPORT_BODY_BYTES } from './client';
export type { HttpMethod, ListOptions, PreparedRequest, RequestOptions } from './client';

// Export configuration
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  withBaseUrl,
  withFetch,
  withLogger,
  withTimeout,
  withUserAgent,
} from './options';
export type { ClientOption, DnsClientConfig } from './options';

// Export errors
export {
  DnsError,
  DnsConfigError,
  DnsValidationError,
  DnsEncodeError,
  DnsTransportError,
  DnsApiError,
  DnsDecodeError,
  isDnsApiError,
} from './errors';

// Export schemas and types
export {
  DomainSchema,
  NameserverCheckResponseSchema,
  RecordSchema,
  ZoneRecordSchema,
  BindImportResponseSchema,
  ClientProfileSchema,
} from './types';
export type {
  // Domain types
  Domain,
  NameserverCheckResponse,
  // Record types
  DnsRecord,
  CreateRecordRequest,
  UpdateRecordRequest,
  // Zone-scoped record types
  ZoneRecord,
  CreateZoneRecordRequest,
  UpdateZoneRecordRequest,
  // Import/account types
  BindImportResponse,
  ClientProfile,
  // API types
  ApiErrorBody,
  QueryParams,
} from './types';
