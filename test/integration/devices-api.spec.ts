/**
 * HTTP tests for the device metrics API
 * Runs the real Express app on an ephemeral loopback port
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createApp } from '../../src/app';
import { MetricsStore } from '../../src/store/metrics-store';
import { DeviceRegistry } from '../../src/services/device-registry';
import { StatsResultsLog } from '../../src/services/stats-results-log';
import { minutesAfter, nanosOf, startServer, stopServer, RunningServer, SECOND_NS } from '../helpers';

const BASE = new Date('2024-03-01T12:00:00.000Z');

function postJson(url: string, body: unknown) {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('Device metrics API', () => {
  let tmpDir: string;
  let resultsFile: string;
  let store: MetricsStore;
  let running: RunningServer;
  let api: string;

  beforeAll(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-api-'));
    resultsFile = path.join(tmpDir, 'results.txt');

    store = new MetricsStore();
    const registry = new DeviceRegistry(store);
    for (const id of ['dev-1', 'dev-2', 'dev-3', 'dev-4', 'dev-5', 'dev-6']) {
      registry.register(id);
    }

    const app = createApp({
      store,
      registry,
      resultsLog: new StatsResultsLog({ filePath: resultsFile }),
    });
    running = await startServer(app);
    api = `${running.baseUrl}/api/v1`;
  });

  afterAll(async () => {
    await stopServer(running.server);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('POST /devices/:device_id/heartbeat', () => {
    it('should record a heartbeat', async () => {
      const res = await postJson(`${api}/devices/dev-1/heartbeat`, { sent_at: BASE.toISOString() });

      expect(res.status).toBe(204);
      await expect(store.getSnapshot('dev-1')).resolves.toMatchObject({ heartbeatCount: 1 });
    });

    it('should accept timestamps with an offset', async () => {
      const res = await postJson(`${api}/devices/dev-1/heartbeat`, {
        sent_at: '2024-03-01T14:01:00.000+02:00',
      });

      expect(res.status).toBe(204);
      await expect(store.getSnapshot('dev-1')).resolves.toMatchObject({
        lastHeartbeatNs: nanosOf(minutesAfter(BASE, 1)),
      });
    });

    it('should keep nanosecond precision from the timestamp', async () => {
      for (const sentAt of [
        '2024-03-01T12:00:00.0009Z',
        '2024-03-01T12:00:00.0001Z',
        '2024-03-01T12:01:00Z',
        '2024-03-01T12:05:00.000000000Z',
      ]) {
        const res = await postJson(`${api}/devices/dev-6/heartbeat`, { sent_at: sentAt });
        expect(res.status).toBe(204);
      }

      await expect(store.getSnapshot('dev-6')).resolves.toMatchObject({
        heartbeatCount: 4,
        firstHeartbeatNs: nanosOf(BASE) + 100_000n,
      });

      const stats = await fetch(`${api}/devices/dev-6/stats`);
      expect(await stats.json()).toEqual({ uptime: 100, avg_upload_time: '0s' });
    });

    it('should reject an unparseable timestamp', async () => {
      const res = await postJson(`${api}/devices/dev-1/heartbeat`, { sent_at: 'yesterday' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ msg: 'invalid request body' });
    });

    it('should reject malformed JSON', async () => {
      const res = await fetch(`${api}/devices/dev-1/heartbeat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"sent_at":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ msg: 'invalid request body' });
    });

    it('should reject devices missing from the whitelist', async () => {
      const res = await postJson(`${api}/devices/ghost/heartbeat`, { sent_at: BASE.toISOString() });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ msg: 'device not found' });
      expect(store.hasDevice('ghost')).toBe(false);
    });
  });

  describe('POST /devices/:device_id/stats', () => {
    it('should record an upload', async () => {
      const res = await postJson(`${api}/devices/dev-2/stats`, {
        sent_at: BASE.toISOString(),
        upload_time: 3 * SECOND_NS,
      });

      expect(res.status).toBe(204);
      await expect(store.getSnapshot('dev-2')).resolves.toMatchObject({ uploadCount: 1 });
    });

    it('should reject a negative upload time', async () => {
      const res = await postJson(`${api}/devices/dev-2/stats`, {
        sent_at: BASE.toISOString(),
        upload_time: -1,
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ msg: 'invalid request body' });
    });

    it('should reject an upload time past the exact JSON number range', async () => {
      const res = await postJson(`${api}/devices/dev-2/stats`, {
        sent_at: BASE.toISOString(),
        upload_time: 2 ** 53,
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ msg: 'invalid request body' });
    });

    it('should reject a missing upload time', async () => {
      const res = await postJson(`${api}/devices/dev-2/stats`, { sent_at: BASE.toISOString() });

      expect(res.status).toBe(400);
    });
  });

  describe('GET /devices/:device_id/stats', () => {
    it('should return uptime and average upload time', async () => {
      for (const minutes of [0, 1, 2, 5]) {
        await postJson(`${api}/devices/dev-3/heartbeat`, { sent_at: minutesAfter(BASE, minutes).toISOString() });
      }
      await postJson(`${api}/devices/dev-3/stats`, { sent_at: BASE.toISOString(), upload_time: 5 * SECOND_NS });
      await postJson(`${api}/devices/dev-3/stats`, { sent_at: BASE.toISOString(), upload_time: 10 * SECOND_NS });

      const res = await fetch(`${api}/devices/dev-3/stats`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toMatch(/application\/json/);
      expect(await res.json()).toEqual({ uptime: 80, avg_upload_time: '7.5s' });
    });

    it('should append the result to the results file', async () => {
      await postJson(`${api}/devices/dev-4/heartbeat`, { sent_at: BASE.toISOString() });

      const res = await fetch(`${api}/devices/dev-4/stats`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ uptime: 100, avg_upload_time: '0s' });

      const lines = fs.readFileSync(resultsFile, 'utf8').trim().split('\n');
      expect(lines[lines.length - 1]).toBe('[dev-4] uptime 100.000000% | avgUploadTime 0s');
    });

    it('should answer 404 for a device without heartbeats', async () => {
      const res = await fetch(`${api}/devices/dev-5/stats`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ msg: 'Device not found' });
    });

    it('should answer 404 for an unknown device', async () => {
      const res = await fetch(`${api}/devices/ghost/stats`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ msg: 'device not found' });
    });
  });

  describe('other routes', () => {
    it('should report health', async () => {
      const res = await fetch(`${running.baseUrl}/health`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: 'healthy', devices: 6 });
    });

    it('should answer 404 for unknown routes', async () => {
      const res = await fetch(`${api}/unknown`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ msg: 'not found' });
    });
  });
});

describe('Device metrics API without whitelist enforcement', () => {
  let store: MetricsStore;
  let running: RunningServer;

  beforeAll(async () => {
    store = new MetricsStore();
    const app = createApp({
      store,
      registry: new DeviceRegistry(store),
      resultsLog: new StatsResultsLog({ filePath: 'unused.txt', enabled: false }),
      apiBase: '/api/v2',
      enforceWhitelist: false,
    });
    running = await startServer(app);
  });

  afterAll(async () => {
    await stopServer(running.server);
  });

  it('should create state for a device on first heartbeat', async () => {
    const res = await postJson(`${running.baseUrl}/api/v2/devices/new-device/heartbeat`, {
      sent_at: BASE.toISOString(),
    });

    expect(res.status).toBe(204);
    expect(store.hasDevice('new-device')).toBe(true);

    const stats = await fetch(`${running.baseUrl}/api/v2/devices/new-device/stats`);
    expect(await stats.json()).toEqual({ uptime: 100, avg_upload_time: '0s' });
  });

  it('should answer 404 from the store for a device it never saw', async () => {
    const res = await fetch(`${running.baseUrl}/api/v2/devices/never-seen/stats`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ msg: 'Device not found' });
  });
});
