import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import type { AddressInfo } from 'net';
import { RouterOsClient } from './routeros.js';
import { t } from '../i18n.js';

const AUTH = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;

describe('RouterOsClient', () => {
  let server: http.Server;
  let port: number;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      if (req.headers.authorization !== AUTH) {
        res.writeHead(401).end();
        return;
      }
      if (req.url === '/rest/system/identity') {
        res.writeHead(200, { 'Content-Type': 'application/json' }).end(JSON.stringify({ name: 'r1' }));
        return;
      }
      if (req.url === '/rest/system/resource') {
        res.writeHead(200, { 'Content-Type': 'application/json' }).end(JSON.stringify({
          version: '7.14.2 (stable)',
          'board-name': 'hAP ax2',
          uptime: '3d4h12m',
          'cpu-load': '2',
        }));
        return;
      }
      res.writeHead(404).end();
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    port = (server.address() as AddressInfo).port;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('lit identité et ressources', async () => {
    const client = new RouterOsClient('127.0.0.1', { username: 'admin', secret: 'test-secret' }, { scheme: 'http', port });

    await expect(client.checkStatus()).resolves.toEqual({
      identity: 'r1',
      version: '7.14.2 (stable)',
      platform: 'hAP ax2',
      uptime: '3d4h12m',
    });
  });

  it('rejette des identifiants refusés avec API_UNREACHABLE', async () => {
    const client = new RouterOsClient('127.0.0.1', { username: 'admin', secret: 'wrong' }, { scheme: 'http', port });

    await expect(client.checkStatus()).rejects.toMatchObject({
      code: 'API_UNREACHABLE',
      message: t('device.apiError', { address: '127.0.0.1', error: t('device.unauthorized') }),
    });
  });

  it('rejette un routeur injoignable', async () => {
    const closed = http.createServer();
    await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', () => resolve()));
    const closedPort = (closed.address() as AddressInfo).port;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const client = new RouterOsClient('127.0.0.1', { username: 'admin', secret: 'test-secret' }, { scheme: 'http', port: closedPort, timeoutMs: 1000 });
    await expect(client.checkStatus()).rejects.toMatchObject({ code: 'API_UNREACHABLE' });
  });
});
