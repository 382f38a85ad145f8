import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DnsClient } from '../src';
import { createTestClient, jsonResponse, textResponse } from './helpers';

const domain = { id: 'domain-1', name: 'example.com' };
const record = { id: 'record-1', name: 'www', type: 'A', value: '192.0.2.10' };
const zoneRecord = { id: 'rec-1', name: 'www', type: 'A', content: '192.0.2.10' };

type Operation = [string, (c: DnsClient) => Promise<unknown>, () => Response];

const operations: Operation[] = [
  ['listDomains', (c) => c.listDomains(), () => jsonResponse([domain])],
  ['createDomain', (c) => c.createDomain('example.com'), () => jsonResponse(domain)],
  ['deleteDomain', (c) => c.deleteDomain('domain-1'), () => textResponse(null, { status: 204 })],
  [
    'checkNameserver',
    (c) => c.checkNameserver('domain-1'),
    () => jsonResponse({ domain, check: { valid: true, status: 'valid' } }),
  ],
  ['listDomainRecords', (c) => c.listDomainRecords('domain-1'), () => jsonResponse([record])],
  ['exportBindZone', (c) => c.exportBindZone('domain-1'), () => textResponse('@ 300 IN A 192.0.2.10\n')],
  [
    'importBindZone',
    (c) => c.importBindZone('@ 300 IN A 192.0.2.10\n'),
    () => jsonResponse({ domain, records_created: 1 }),
  ],
  [
    'createRecord',
    (c) => c.createRecord({ domain_id: 'domain-1', name: 'www', type: 'A', value: '192.0.2.10' }),
    () => jsonResponse(record),
  ],
  ['updateRecord', (c) => c.updateRecord('record-1', { ttl: 60 }), () => jsonResponse(record)],
  ['deleteRecord', (c) => c.deleteRecord('record-1'), () => textResponse(null, { status: 204 })],
  ['listZoneRecords', (c) => c.listZoneRecords('example.com'), () => jsonResponse([zoneRecord])],
  [
    'createZoneRecord',
    (c) => c.createZoneRecord('example.com', { name: 'www', type: 'A', content: '192.0.2.10' }),
    () => jsonResponse(zoneRecord),
  ],
  [
    'updateZoneRecord',
    (c) => c.updateZoneRecord('example.com', 'rec-1', { ttl: 60 }),
    () => jsonResponse(zoneRecord),
  ],
  [
    'deleteZoneRecord',
    (c) => c.deleteZoneRecord('example.com', 'rec-1'),
    () => textResponse(null, { status: 204 }),
  ],
  [
    'rotateApiKey',
    (c) => c.rotateApiKey(),
    () =>
      jsonResponse({
        id: 'client-1',
        name: 'Example Ltd',
        email: 'ops@example.test',
        api_token: 'new-test-key',
      }),
  ],
];

describe('DnsClient authentication', () => {
  let client: DnsClient;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    ({ client, mockFetch } = createTestClient());
  });

  it.each(operations)('%s should send the bearer credential', async (_name, call, respond) => {
    mockFetch.mockResolvedValueOnce(respond());

    await call(client);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [, init] = mockFetch.mock.calls[0];
    expect(init.headers.Authorization).toBe('Bearer test-key');
  });
});
