import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { subDays } from 'date-fns';
import type { AppConfig } from '../../src/config/env.js';
import type { Container } from '../../src/container.js';
import { outageInput } from '../helpers/fixtures.js';
import { createTestContainer, startTestServer, type TestServer } from '../helpers/testContainer.js';

interface SentRequest {
  method: string | undefined;
  url: string | undefined;
  secret: unknown;
  timeout: number | undefined;
}

// axios instance answering from memory in place of the sibling node
function stubPeer(status: number, data: unknown) {
  const sent: SentRequest[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      sent.push({ method: config.method, url: config.url, secret: config.headers.get('x-sync-secret'), timeout: config.timeout });
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { http, sent };
}

const at = (day: number, hour: number) => new Date(2025, 0, day, hour, 0, 0).toISOString();

const feedItem = (overrides: Record<string, unknown> = {}) => ({
  report_id: 40,
  full_name: 'Rosa Villanueva',
  contact_number: '09170000002',
  email: null,
  address: 'Purok 1, Brgy. Tabucan, Pavia',
  latitude: 10.77,
  longitude: 122.54,
  details: 'Transformer humming then no power',
  incident_type: 'power_outage',
  priority: 'HIGH',
  status: 'NEW',
  source: 'WebForm',
  timestamp: at(14, 7),
  ...overrides,
});

describe('catch-up sync', () => {
  let container: Container;
  let server: TestServer;
  let auth: { headers: { Authorization: string } };

  async function start(overrides: Partial<AppConfig>, peer: ReturnType<typeof stubPeer>) {
    container = await createTestContainer({ syncSecret: 'test-secret', ...overrides }, { http: peer.http });
    server = await startTestServer(container);
    const login = await server.http.post('/login', { username: 'admin', password: 'test-secret' });
    auth = { headers: { Authorization: `Bearer ${login.data.token}` } };
  }

  afterEach(async () => {
    await server.close();
    container.stop();
  });

  it('copies the reports this node is missing, one per contact and day', async () => {
    const peer = stubPeer(200, {
      success: true,
      complaints: [
        feedItem({ report_id: 41, contact_number: '09170000001', timestamp: at(14, 17) }),
        feedItem({ report_id: 42, priority: 'critical', status: 'in_progress' }),
        feedItem({ report_id: 43, timestamp: at(13, 20) }),
        feedItem({ report_id: 44, details: '' }),
      ],
    });
    await start({ relayUrl: 'http://peer.test/' }, peer);
    await container.intake.submit(outageInput({ customerContact: '09170000001', createdAt: at(14, 8) }));

    const res = await server.http.post('/api/sync_from_peer', {}, auth);

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      success: true,
      synced: 2,
      skipped: 1,
      invalid: 1,
      message: 'Synced 2 new complaints from the sibling node',
    });
    expect(peer.sent).toEqual([
      { method: 'get', url: 'http://peer.test/api/export_complaints', secret: 'test-secret', timeout: 1000 },
    ]);

    const copied = (await container.aggregator.aggregate()).filter((c) => c.source === 'Synced from EC2');
    expect(copied.map((c) => [c.displayId, c.customerContact, c.status, c.priority, c.createdAt])).toEqual([
      ['PO-000003', '09170000002', 'NEW', 'HIGH', at(13, 20)],
      ['PO-000002', '09170000002', 'IN_PROGRESS', 'CRITICAL', at(14, 7)],
    ]);
    expect(copied[1]?.location).toEqual({ latitude: 10.77, longitude: 122.54, accuracy: null });
  });

  it('copies a row once when two catch-ups overlap', async () => {
    const peer = stubPeer(200, { complaints: [] });
    await start({ relayUrl: 'http://peer.test' }, peer);

    const results = await Promise.all([container.sync.catchUp([feedItem()]), container.sync.catchUp([feedItem()])]);

    expect(results.map((r) => r.synced).sort()).toEqual([0, 1]);
    expect(await container.aggregator.aggregate()).toHaveLength(1);
  });

  it('answers 502 when the sibling node fails', async () => {
    await start({ relayUrl: 'http://peer.test' }, stubPeer(503, { error: 'down' }));

    const res = await server.http.post('/api/sync_from_peer', {}, auth);

    expect(res.status).toBe(502);
    expect(res.data).toEqual({ success: false, error: 'Failed to fetch complaints from the sibling node' });
    expect(await container.aggregator.aggregate()).toEqual([]);
  });

  it('answers 502 for a feed without a complaints list', async () => {
    await start({ relayUrl: 'http://peer.test' }, stubPeer(200, { success: true }));

    const res = await server.http.post('/api/sync_from_peer', {}, auth);
    expect(res.status).toBe(502);
    expect(res.data).toEqual({ success: false, error: 'Sibling node sent an unreadable export feed' });
  });

  it('needs a session and a configured sibling node', async () => {
    const peer = stubPeer(200, { complaints: [] });
    await start({ relayUrl: '' }, peer);

    expect((await server.http.post('/api/sync_from_peer')).status).toBe(401);

    const res = await server.http.post('/api/sync_from_peer', {}, auth);
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ success: false, error: 'No sibling node configured (RELAY_URL)' });
    expect(peer.sent).toEqual([]);
  });
});

describe('export feed', () => {
  let container: Container;
  let server: TestServer;

  beforeEach(async () => {
    container = await createTestContainer({ syncSecret: 'test-secret' });
    server = await startTestServer(container);
  });

  afterEach(async () => {
    await server.close();
    container.stop();
  });

  it('lists the last week of outage reports to the sibling node', async () => {
    const recent = await container.intake.submit(outageInput({ email: 'juan@example.com', incident: { type: 'power_outage' } }));
    await container.intake.submit(outageInput({ customerContact: '09179999999', createdAt: subDays(new Date(), 10).toISOString() }));
    await container.intake.submit(outageInput({ family: 'meter_concern', description: 'Meter has no display' }));

    const res = await server.http.get('/api/export_complaints', { headers: { 'x-sync-secret': 'test-secret' } });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      success: true,
      complaints: [
        {
          report_id: 1,
          full_name: 'Juan Dela Cruz',
          contact_number: '09171234567',
          email: 'juan@example.com',
          address: 'Brgy. Bacan, Cabatuan, Iloilo',
          latitude: null,
          longitude: null,
          details: 'No power since morning',
          incident_type: 'power_outage',
          priority: 'HIGH',
          timestamp: recent.createdAt,
          status: 'NEW',
          source: 'WebForm',
        },
      ],
    });
  });

  it('refuses callers without a session or the shared secret', async () => {
    expect((await server.http.get('/api/export_complaints')).status).toBe(401);
    expect((await server.http.get('/api/export_complaints', { headers: { 'x-sync-secret': 'wrong' } })).status).toBe(401);

    const login = await server.http.post('/login', { username: 'admin', password: 'test-secret' });
    const res = await server.http.get('/api/export_complaints', { headers: { Authorization: `Bearer ${login.data.token}` } });
    expect(res.data).toEqual({ success: true, complaints: [] });
  });
});
