import fs from 'fs';
import os from 'os';
import path from 'path';
import { createLogger } from '../utils/logger';

describe('createLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below the level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn' });

    logger.info('composing');
    logger.warn('[audit] Overlapping value');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('⚠️  [audit] Overlapping value');
  });

  it('should append to the log file instead of the console', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-compose-log-'));
    const file = path.join(dir, 'compose.log');
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      const logger = createLogger({ level: 'debug', file, name: 'shop' });
      logger.debug('Plugin order: core, audit');
      logger.error('broken');

      expect(log).not.toHaveBeenCalled();
      expect(fs.readFileSync(file, 'utf-8')).toBe('shop|DEBUG|Plugin order: core, audit\nshop|ERROR|broken\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
