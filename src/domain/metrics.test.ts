/**
 * Unit tests for the metrics collector
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { metrics } from './metrics.js';

describe('metrics', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('should export counters and average latency', () => {
    metrics.incrementCommandCall('weather', 'success');
    metrics.incrementCommandCall('weather', 'success');
    metrics.incrementCommandCall('meteo', 'error');
    metrics.recordLatency('weather', 100);
    metrics.recordLatency('weather', 50);
    metrics.incrementGeocodeStatus('ZERO_RESULTS');

    const lines = metrics.exportPrometheus().split('\n');

    expect(lines).toContain('skycast_command_calls_total{command="weather",outcome="success"} 2');
    expect(lines).toContain('skycast_command_calls_total{command="meteo",outcome="error"} 1');
    expect(lines).toContain('skycast_command_latency_ms_avg{command="weather"} 75.00');
    expect(lines).toContain('skycast_geocode_status_total{status="ZERO_RESULTS"} 1');
  });

  it('should export only headers after reset', () => {
    metrics.incrementCommandCall('weather', 'success');
    metrics.reset();

    expect(metrics.exportPrometheus()).not.toContain('command="weather"');
  });
});
