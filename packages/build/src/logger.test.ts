/**
 * @tessera/build — Logger tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { stripColors } from 'kolorist';
import { createConsoleLogger } from './logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createConsoleLogger', () => {
  it('prefixes messages and routes them by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger();

    logger.debug('hidden');
    logger.info('building');
    logger.warn('careful');
    logger.error('broken');

    expect(log.mock.calls.map(([line]) => stripColors(String(line)))).toEqual(['[tessera] building']);
    expect(warn.mock.calls.map(([line]) => stripColors(String(line)))).toEqual(['[tessera] careful']);
    expect(error.mock.calls.map(([line]) => stripColors(String(line)))).toEqual(['[tessera] broken']);
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'warn', prefix: '[x]' });

    logger.info('quiet');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn.mock.calls.map(([line]) => stripColors(String(line)))).toEqual(['[x] loud']);
  });
});
