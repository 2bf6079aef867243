import { describe, it, expect } from '@jest/globals';
import { createLogger, formatEntry } from '../logger.js';

describe('logger', () => {
  describe('formatEntry', () => {
    it('should write one JSON object per entry', () => {
      expect(
        formatEntry({ level: 'info', message: 'GET /plans', component: 'http', timestamp: '2024-01-01T00:00:00.000Z' })
      ).toBe('{"level":"info","message":"GET /plans","timestamp":"2024-01-01T00:00:00.000Z","component":"http"}');
    });

    it('should reduce errors to name and message', () => {
      const line = formatEntry({
        level: 'error',
        message: 'failed',
        meta: new Error('boom'),
        timestamp: '2024-01-01T00:00:00.000Z',
      });
      expect(JSON.parse(line).meta).toEqual({ name: 'Error', message: 'boom' });
    });
  });

  describe('createLogger', () => {
    it('should drop entries below the minimum level', () => {
      const lines: string[] = [];
      const logger = createLogger('aggregator', 'warn', (line) => {
        lines.push(line);
      });

      logger.info('ignored');
      logger.warn('kept', { suite: 'Root A' });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        level: 'warn',
        message: 'kept',
        component: 'aggregator',
        meta: { suite: 'Root A' },
      });
    });
  });
});
