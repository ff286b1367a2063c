import { describe, it, expect, afterEach, vi } from 'vitest';
import { formatMessage, logger, parseLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    logger.configure({ level: 'info', colors: null, prefix: '' });
    vi.restoreAllMocks();
  });

  it('reconnaît les niveaux', () => {
    expect(parseLevel('warn')).toBe('warn');
    expect(parseLevel('verbose')).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });

  it('formate niveau, préfixe et portée', () => {
    logger.configure({ colors: false, prefix: 'wgfleet' });
    const line = formatMessage('warn', 'Base injoignable', [new Error('ECONNREFUSED'), { port: 5432 }], 'postgres');

    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[WARN \] /);
    expect(line.endsWith('[wgfleet] [postgres] Base injoignable ECONNREFUSED {"port":5432}')).toBe(true);
  });

  it('filtre sous le niveau courant', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.configure({ level: 'warn', colors: false });

    logger.info('ignoré');
    logger.createSimpleLogger('warn', 'probe')('conservé');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0]).endsWith('[probe] conservé')).toBe(true);
  });
});
