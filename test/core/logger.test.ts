import { afterEach, describe, expect, it, vi } from 'vitest';
import { JsonLogger } from '../../src/core/logger.js';

describe('JsonLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one JSON line per entry with child bindings merged in', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const logger = new JsonLogger('info', { service: 'arena' }).child({ component: 'battle' });

    logger.info('round winner selected', { epoch: 3 });

    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    expect(JSON.parse(line)).toMatchObject({
      level: 'info',
      message: 'round winner selected',
      service: 'arena',
      component: 'battle',
      epoch: 3
    });
  });

  it('drops entries below the minimum level', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const logger = new JsonLogger('warn');
    logger.info('quiet');
    logger.debug('quieter');
    logger.error('loud');
    expect(write).toHaveBeenCalledTimes(1);
  });
});
