import assert from 'node:assert/strict';
import { afterEach, describe, it, vi } from 'vitest';
import { createLogger } from '../logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes every level to stderr and leaves stdout to the dashboard', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger('connection');

    logger.info('Connected');
    logger.warn('Treadmill disconnected');

    assert.equal(stdout.mock.calls.length, 0);
    assert.deepEqual(stderr.mock.calls.map(call => call[0]), [
      '[connection] Connected\n',
      '[connection] Treadmill disconnected\n',
    ]);
  });
});
