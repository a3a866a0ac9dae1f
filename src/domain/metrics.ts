/**
 * In-memory metrics with Prometheus text export
 */

interface LatencyMetric {
  sum: number;
  count: number;
}

class MetricsCollector {
  // skycast_command_calls_total{command, outcome}
  private commandCalls: Map<string, Map<string, number>> = new Map();

  // skycast_command_latency_ms{command}
  private latencies: Map<string, LatencyMetric> = new Map();

  // skycast_geocode_status_total{status}
  private geocodeStatuses: Map<string, number> = new Map();

  incrementCommandCall(command: string, outcome: 'success' | 'error'): void {
    let outcomes = this.commandCalls.get(command);
    if (!outcomes) {
      outcomes = new Map();
      this.commandCalls.set(command, outcomes);
    }
    outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
  }

  recordLatency(command: string, latencyMs: number): void {
    const metric = this.latencies.get(command) ?? { sum: 0, count: 0 };
    metric.sum += latencyMs;
    metric.count++;
    this.latencies.set(command, metric);
  }

  incrementGeocodeStatus(status: string): void {
    this.geocodeStatuses.set(status, (this.geocodeStatuses.get(status) ?? 0) + 1);
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP skycast_command_calls_total Total number of weather commands by command and outcome');
    lines.push('# TYPE skycast_command_calls_total counter');
    this.commandCalls.forEach((outcomes, command) => {
      outcomes.forEach((count, outcome) => {
        lines.push(`skycast_command_calls_total{command="${command}",outcome="${outcome}"} ${count}`);
      });
    });

    lines.push('');
    lines.push('# HELP skycast_command_latency_ms_avg Average latency of weather commands in milliseconds');
    lines.push('# TYPE skycast_command_latency_ms_avg gauge');
    this.latencies.forEach((metric, command) => {
      const avg = metric.count > 0 ? metric.sum / metric.count : 0;
      lines.push(`skycast_command_latency_ms_avg{command="${command}"} ${avg.toFixed(2)}`);
    });

    lines.push('');
    lines.push('# HELP skycast_geocode_status_total Geocoding API status codes received');
    lines.push('# TYPE skycast_geocode_status_total counter');
    this.geocodeStatuses.forEach((count, status) => {
      lines.push(`skycast_geocode_status_total{status="${status}"} ${count}`);
    });

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.commandCalls.clear();
    this.latencies.clear();
    this.geocodeStatuses.clear();
  }
}

// Singleton metrics collector
export const metrics = new MetricsCollector();
