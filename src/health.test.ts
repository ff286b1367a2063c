import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type AddressInfo, type Server, type Socket } from 'net';
import { HealthProbe, SystemProbe, type ProbeCapability } from './health.js';
import type { DeviceCredentials, DeviceStatus } from './device/routeros.js';
import { FleetError } from './errors.js';
import { t } from './i18n.js';

/**
 * Capacité scriptée : réponses d'écho successives et état du port
 */
class ScriptedCapability implements ProbeCapability {
  pings: string[] = [];
  ports: Array<[string, number]> = [];

  constructor(
    private readonly echoes: Array<boolean | Error>,
    private readonly port: boolean | Error = true
  ) {}

  async ping(address: string): Promise<boolean> {
    this.pings.push(address);
    const next = this.echoes[Math.min(this.pings.length - 1, this.echoes.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }

  async portOpen(address: string, port: number): Promise<boolean> {
    this.ports.push([address, port]);
    if (this.port instanceof Error) throw this.port;
    return this.port;
  }
}

const quiet = () => undefined;

describe('HealthProbe.check', () => {
  it('s’arrête au premier écho puis teste le port API', async () => {
    const capability = new ScriptedCapability([false, true]);
    const probe = new HealthProbe({ timeoutMs: 500, attempts: 3, apiPort: 8728 }, capability, quiet);

    const result = await probe.check('10.10.0.2');
    expect(result).toMatchObject({ address: '10.10.0.2', reachable: true, apiAccessible: true, attempts: 2 });
    expect(result.reason).toBeUndefined();
    expect(result.timestamp).toBeInstanceOf(Date);
    expect(capability.ports).toEqual([['10.10.0.2', 8728]]);
  });

  it('épuise les tentatives sans tester le port', async () => {
    const capability = new ScriptedCapability([false]);
    const probe = new HealthProbe({ timeoutMs: 500, attempts: 3, apiPort: 8728 }, capability, quiet);

    const result = await probe.check('10.10.0.9');
    expect(result).toMatchObject({
      reachable: false,
      apiAccessible: false,
      attempts: 3,
      reason: t('probe.noEcho', { address: '10.10.0.9', attempts: 3 }),
    });
    expect(capability.ports).toEqual([]);
  });

  it('signale un port fermé sur un peer joignable', async () => {
    const probe = new HealthProbe({ timeoutMs: 500, attempts: 1, apiPort: 8728 }, new ScriptedCapability([true], false), quiet);

    const result = await probe.check('10.10.0.3', 8729);
    expect(result).toMatchObject({
      reachable: true,
      apiAccessible: false,
      reason: t('probe.portClosed', { address: '10.10.0.3', port: 8729 }),
    });
  });

  it('ne lève jamais sur une erreur de capacité', async () => {
    const probe = new HealthProbe({ timeoutMs: 500, attempts: 2, apiPort: 8728 }, new ScriptedCapability([new Error('EPERM')]), quiet);

    const result = await probe.check('10.10.0.4');
    expect(result).toMatchObject({
      reachable: false,
      attempts: 2,
      reason: t('probe.pingError', { address: '10.10.0.4', error: 'EPERM' }),
    });
  });

  it('rapporte la raison de la dernière tentative', async () => {
    const probe = new HealthProbe(
      { timeoutMs: 500, attempts: 3, apiPort: 8728 },
      new ScriptedCapability([new Error('EAGAIN spawn'), false]),
      quiet
    );

    const result = await probe.check('10.10.0.2');
    expect(result.attempts).toBe(3);
    expect(result.reason).toBe(t('probe.noEcho', { address: '10.10.0.2', attempts: 3 }));
  });

  it('valide ses bornes', () => {
    const capability = new ScriptedCapability([true]);
    expect(() => new HealthProbe({ attempts: 0 }, capability, quiet)).toThrow(RangeError);
    expect(() => new HealthProbe({ attempts: 11 }, capability, quiet)).toThrow(RangeError);
    expect(() => new HealthProbe({ timeoutMs: 50 }, capability, quiet)).toThrow(RangeError);
    expect(() => new HealthProbe({ timeoutMs: 20_000 }, capability, quiet)).toThrow(RangeError);
    expect(new HealthProbe({}, capability, quiet).apiPort).toBe(8728);
  });
});

describe('HealthProbe.checkDevice', () => {
  const status: DeviceStatus = { identity: 'r1', version: '7.14.2 (stable)', platform: 'hAP ax2', uptime: '3d4h' };

  it('renvoie l’état du routeur', async () => {
    const seen: Array<[string, DeviceCredentials]> = [];
    const probe = new HealthProbe({}, new ScriptedCapability([true]), quiet, (address, credentials) => {
      seen.push([address, credentials]);
      return { checkStatus: async () => status };
    });

    expect(await probe.checkDevice('10.10.0.2', { username: 'admin', secret: 'test-secret' })).toEqual({ ok: true, status });
    expect(seen).toEqual([['10.10.0.2', { username: 'admin', secret: 'test-secret' }]]);
  });

  it('convertit une erreur d’API en raison', async () => {
    const probe = new HealthProbe({}, new ScriptedCapability([true]), quiet, () => ({
      checkStatus: async () => {
        throw new FleetError('API_UNREACHABLE', 'refus');
      },
    }));

    expect(await probe.checkDevice('10.10.0.2', { username: 'admin', secret: 'test-secret' })).toEqual({
      ok: false,
      reason: t('probe.deviceError', { address: '10.10.0.2', error: 'refus' }),
    });
  });
});

describe('SystemProbe.portOpen', () => {
  let server: Server;
  let port: number;
  const received: string[] = [];
  const sockets: Socket[] = [];

  beforeAll(async () => {
    // Accepte les connexions sans jamais répondre
    server = createServer((socket) => {
      sockets.push(socket);
      socket.on('data', (chunk) => received.push(chunk.toString()));
      socket.on('error', () => undefined);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    port = (server.address() as AddressInfo).port;
  });

  afterAll(async () => {
    sockets.forEach((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('détecte un port ouvert sans rien envoyer', async () => {
    const started = Date.now();
    await expect(new SystemProbe().portOpen('127.0.0.1', port, 300)).resolves.toBe(true);
    expect(Date.now() - started).toBeLessThan(300);
    expect(received).toEqual([]);
  });

  it('détecte un port fermé', async () => {
    const closed = createServer();
    await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', () => resolve()));
    const closedPort = (closed.address() as AddressInfo).port;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    await expect(new SystemProbe().portOpen('127.0.0.1', closedPort, 1000)).resolves.toBe(false);
  });

  it('répond dans le délai imparti et une seule fois', async () => {
    const probe = new SystemProbe();
    const started = Date.now();
    const results = await Promise.all([
      probe.portOpen('127.0.0.1', port, 200),
      probe.portOpen('127.0.0.1', port, 200),
    ]);

    expect(results).toEqual([true, true]);
    expect(Date.now() - started).toBeLessThan(200);
  });
});
