/**
 * Unit tests for the structured logger
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger } from './logger.js';

function loggedEntries(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map(([line]) => JSON.parse(String(line)));
}

describe('logger', () => {
  let stderr: MockInstance<typeof console.error>;

  beforeEach(() => {
    stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel('info');
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    logger.debug('hidden');
    logger.warn('shown');

    expect(loggedEntries(stderr)).toEqual([
      { timestamp: expect.any(String), level: 'warn', message: 'shown' },
    ]);
  });

  it('should only keep safe input fields in command start logs', () => {
    logger.logCommandStart('weather', { nick: 'alice', location: 'Paris', apiKey: 'test-secret' }, 'req-1');

    expect(loggedEntries(stderr)).toEqual([
      {
        timestamp: expect.any(String),
        level: 'info',
        message: 'Command started',
        context: {
          requestId: 'req-1',
          commandName: 'weather',
          inputSummary: { nick: 'alice', location: 'Paris' },
        },
      },
    ]);
  });

  it('should include the error kind only when present', () => {
    logger.logCommandEnd('meteo', 12, 'success', 'req-2');

    expect(loggedEntries(stderr)).toEqual([
      {
        timestamp: expect.any(String),
        level: 'info',
        message: 'Command completed',
        context: { requestId: 'req-2', commandName: 'meteo', latencyMs: 12, outcome: 'success' },
      },
    ]);
  });
});
