import { vi } from 'vitest';
import { DnsClient, withBaseUrl, withFetch, type ClientOption } from '../src';

export const TEST_BASE_URL = 'https://example.test';

interface ResponseOptions {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
}

export function jsonResponse(data: unknown, options: ResponseOptions = {}): Response {
  return new Response(JSON.stringify(data), {
    status: options.status ?? 200,
    statusText: options.statusText,
    headers: { 'Content-Type': 'application/json', ...options.headers },
  });
}

export function textResponse(text: string | null, options: ResponseOptions = {}): Response {
  return new Response(text, {
    status: options.status ?? 200,
    statusText: options.statusText,
    headers: options.headers,
  });
}

/** Client pointed at the test base URL, with fetch replaced by a mock */
export function createTestClient(...options: ClientOption[]) {
  const mockFetch = vi.fn();
  const client = new DnsClient(
    'test-key',
    withBaseUrl(TEST_BASE_URL),
    withFetch(mockFetch as unknown as typeof fetch),
    ...options
  );
  return { client, mockFetch };
}
