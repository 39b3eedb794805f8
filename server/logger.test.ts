import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.ts';

describe('logger', () => {
  it('writes lines at or above the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', line => lines.push(line));
    logger.debug('match', 'hidden');
    logger.info('match', 'hidden');
    logger.warn('match', 'slow tick');
    logger.error('http', 'boom');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \| warn \| match \| slow tick$/);
    expect(lines[1]?.endsWith(' | error | http | boom')).toBe(true);
  });
});
