import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalConfigRecordSource } from './local-config.js';
import { ConfigStore } from '../tunnel/config-file.js';
import { t } from '../i18n.js';

describe('LocalConfigRecordSource', () => {
  let dir: string;
  let store: ConfigStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wgfleet-local-'));
    const path = join(dir, 'wg0.conf');
    writeFileSync(path, '[Interface]\nListenPort = 51820\n\n# r1\n[Peer]\nPublicKey = key-r1\nAllowedIPs = 10.10.0.2/32\n');
    store = new ConfigStore({ path, interfaceName: 'wg0', daemon: null, log: () => undefined });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('expose les peers du fichier comme actifs et jamais vérifiés', async () => {
    const source = new LocalConfigRecordSource(store, () => undefined);
    expect(await source.init()).toBe(true);

    expect(await source.list()).toEqual({
      ok: true,
      value: [{
        name: 'r1',
        publicKey: 'key-r1',
        address: '10.10.0.2',
        active: true,
        apiAccessible: false,
        lastCheck: null,
        source: 'wireguard-config',
      }],
    });
    const missing = await source.get('r9');
    expect(!missing.ok && missing.error).toBe('not_found');
  });

  it('refuse les écritures', async () => {
    const source = new LocalConfigRecordSource(store, () => undefined);
    await source.init();

    expect(source.writable).toBe(false);
    expect(await source.remove('r1')).toEqual({
      ok: false,
      error: 'unavailable',
      message: t('source.readOnly', { source: 'wireguard-config' }),
    });
    expect(store.findPeer('r1')).toBeDefined();
  });

  it('reste disponible quand le fichier n’existe pas encore', async () => {
    const empty = new ConfigStore({ path: join(dir, 'absent.conf'), interfaceName: 'wg0', daemon: null, log: () => undefined });
    const source = new LocalConfigRecordSource(empty, () => undefined);

    expect(await source.init()).toBe(true);
    expect(await source.list()).toEqual({ ok: true, value: [] });
  });
});
