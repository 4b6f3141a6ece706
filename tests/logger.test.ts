/**
 * Tests for Logger
 */

import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { Logger } from '../src/utils/logger.js';

describe('Logger', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix child loggers with their scope and write to stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger(undefined, { level: 'info', quiet: false }).child('zetalytics');

    log.info('hello');

    expect(stderr).toHaveBeenCalledWith('[INFO] [zetalytics] hello');
  });

  it('should drop messages below the level shared with children', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const root = new Logger(undefined, { level: 'info', quiet: false });
    const child = root.child('bus');

    child.debug('hidden');
    root.setLevel('debug');
    child.debug('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith('[DEBUG] [bus] shown');
  });

  it('should stay silent in quiet mode', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger(undefined, { level: 'debug', quiet: true });

    log.error('nothing');

    expect(stderr).not.toHaveBeenCalled();
  });
});
