/**
 * DNS Client Types
 *
 * Wire shapes of the DNS management API. Each response shape is a zod schema
 * and its TypeScript type is inferred from it, so what the client decodes and
 * what callers see are the same thing. Field names are kept as served.
 */

import { z } from 'zod';

/** ISO-8601 timestamp, or null when the event has not happened */
const timestamp = z.string().nullish();

// =============================================================================
// DOMAIN TYPES
// =============================================================================

export const DomainSchema = z.object({
  /** Domain ID */
  id: z.string(),
  /** Owning client ID */
  client_id: z.string().optional(),
  /** Domain name, as stored by the API (may carry a trailing dot) */
  name: z.string(),
  /** Whether the domain is served */
  active: z.boolean().optional(),
  created_at: timestamp,
  updated_at: timestamp,
  /** Last time the delegation was checked */
  nameserver_last_checked_at: timestamp,
  /** When the delegation was first seen pointing at the API's nameservers */
  nameserver_verified_at: timestamp,
  /** Outcome of the last check (e.g. "pending", "valid", "invalid") */
  nameserver_check_status: z.string().optional(),
});

/** Domain owned by the authenticated client */
export type Domain = z.infer<typeof DomainSchema>;

export const NameserverCheckSchema = z.object({
  valid: z.boolean(),
  status: z.string(),
});

export const NameserverCheckResponseSchema = z.object({
  domain: DomainSchema,
  check: NameserverCheckSchema,
});

/** Result of a nameserver check */
export type NameserverCheckResponse = z.infer<typeof NameserverCheckResponseSchema>;

// =============================================================================
// DNS RECORD TYPES
// =============================================================================

export const RecordSchema = z.object({
  /** Record ID */
  id: z.string(),
  /** Owning domain ID */
  domain_id: z.string().optional(),
  /** Record name (e.g. "www" or "@" for the apex) */
  name: z.string(),
  type: z.string(),
  /** Record data (address, hostname, text...) */
  value: z.string(),
  /** Time to live in seconds */
  ttl: z.number().optional(),
  /** Country codes this answer is restricted to, if any */
  country_codes: z.array(z.string()).nullish(),
  /** Priority for MX/SRV records */
  priority: z.number().optional(),
  created_at: timestamp,
  updated_at: timestamp,
});

/** DNS record of the domain-scoped API */
export type DnsRecord = z.infer<typeof RecordSchema>;

/** Request to create a record */
export interface CreateRecordRequest {
  /** Domain the record belongs to */
  domain_id: string;
  name: string;
  /** Record type (A, AAAA, CNAME, MX, TXT...) */
  type: string;
  value: string;
  ttl?: number;
  priority?: number;
  country_codes?: string[];
}

/**
 * Request to update a record.
 *
 * Only properties that are set are sent; an empty string or an empty array is
 * a value and is sent as such.
 */
export interface UpdateRecordRequest {
  name?: string;
  type?: string;
  value?: string;
  ttl?: number;
  priority?: number;
  country_codes?: string[];
}

// =============================================================================
// ZONE-SCOPED RECORD TYPES
// =============================================================================

export const ZoneRecordSchema = z
  .object({
    /** Record ID */
    id: z.string(),
    /** Zone name */
    zone: z.string().optional(),
    name: z.string(),
    type: z.string(),
    /** Record data */
    content: z.string(),
    ttl: z.number().optional(),
    priority: z.number().optional(),
    /** Weight for SRV records */
    weight: z.number().optional(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .passthrough();

/** DNS record of the zone-scoped API */
export type ZoneRecord = z.infer<typeof ZoneRecordSchema>;

/** Request to create a zone-scoped record */
export interface CreateZoneRecordRequest {
  name: string;
  type: string;
  content: string;
  ttl?: number;
  priority?: number;
  weight?: number;
}

/** Request to update a zone-scoped record; unset properties are not sent */
export type UpdateZoneRecordRequest = Partial<CreateZoneRecordRequest>;

// =============================================================================
// BIND IMPORT TYPES
// =============================================================================

export const BindImportResponseSchema = z.object({
  /** Domain the zone was imported into */
  domain: DomainSchema,
  /** Number of records created */
  records_created: z.number(),
  /** Records created by the import */
  records: z.array(RecordSchema).nullish(),
  /** True when some lines were rejected */
  partial_success: z.boolean().optional(),
  /** One message per rejected line */
  errors: z.array(z.string()).nullish(),
});

/** Result of a BIND zone import */
export type BindImportResponse = z.infer<typeof BindImportResponseSchema>;

// =============================================================================
// ACCOUNT TYPES
// =============================================================================

export const ClientProfileSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  /** The newly issued API token */
  api_token: z.string(),
  /** Maximum number of domains */
  domain_limit: z.number().optional(),
  created_at: timestamp,
  updated_at: timestamp,
});

/** Client profile returned by key rotation */
export type ClientProfile = z.infer<typeof ClientProfileSchema>;

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

/** Error body served with non-success statuses */
export const ApiErrorBodySchema = z.object({
  message: z.string().nullish(),
  code: z.string().nullish(),
});

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;

/** Query parameters; undefined values are dropped */
export type QueryParams = Record<string, string | number | boolean | undefined>;
