import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, noopLogger } from '../src/index.js';

describe('createConsoleLogger', () => {
  it('prefixes messages with their level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger('info');

    logger.info('run started', { runId: 'r1' });
    logger.warn('retrying');

    expect(info).toHaveBeenCalledWith('[INFO] run started', { runId: 'r1' });
    expect(warn).toHaveBeenCalledWith('[WARN] retrying');
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger('error');

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] shown');
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger('silent').error('nothing');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('noopLogger', () => {
  it('accepts every level without output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    noopLogger.debug('a');
    noopLogger.info('b');
    noopLogger.warn('c');
    noopLogger.error('d');
    expect(log).not.toHaveBeenCalled();
  });
});
