/**
 * Logger tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import pino from 'pino';
import { getLogger, setLogger, createLogger } from './logger.js';

function captureLogger(): { logger: pino.Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'info' }, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

describe('logger', () => {
  afterEach(() => {
    setLogger(null);
  });

  it('should build the logger from config with the configured level', () => {
    const logger = getLogger();

    expect(logger.level).toBe('error');
    expect(getLogger()).toBe(logger);
  });

  it('should route child loggers through a replaced instance', () => {
    const { logger, lines } = captureLogger();
    setLogger(logger);

    createLogger({ module: 'pipeline' }).info({ documents: 2 }, 'Starting extraction');

    expect(lines).toHaveLength(1);
    expect(lines[0].module).toBe('pipeline');
    expect(lines[0].documents).toBe(2);
    expect(lines[0].msg).toBe('Starting extraction');
  });

  it('should rebuild after a reset', () => {
    const { logger } = captureLogger();
    setLogger(logger);
    setLogger(null);

    expect(getLogger()).not.toBe(logger);
  });
});
