/**
 * In-memory metrics with Prometheus text export
 * Map-based counters, no external dependencies
 */

interface LatencyMetric {
  sum: number;
  count: number;
}

export type UnitOutcome = 'written' | 'empty' | 'failed';

export interface MetricsSnapshot {
  toolCalls: Record<string, Record<string, number>>;
  latencies: Record<string, { avg: number; count: number }>;
  units: Record<string, number>;
  recordsSkipped: number;
  featuresEmitted: number;
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // mcp_tool_calls_total{tool_name, outcome}
  private toolCalls: Map<string, Map<string, number>> = new Map();

  // mcp_tool_latency_ms{tool_name}
  private latencies: Map<string, LatencyMetric> = new Map();

  // ssr_units_total{outcome}
  private units: Map<UnitOutcome, number> = new Map();

  private recordsSkipped = 0;
  private featuresEmitted = 0;

  incrementToolCall(toolName: string, outcome: 'success' | 'error'): void {
    const outcomes = this.toolCalls.get(toolName) ?? new Map<string, number>();
    outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
    this.toolCalls.set(toolName, outcomes);
  }

  recordLatency(toolName: string, latencyMs: number): void {
    const metric = this.latencies.get(toolName) ?? { sum: 0, count: 0 };
    metric.sum += latencyMs;
    metric.count++;
    this.latencies.set(toolName, metric);
  }

  /**
   * Count one converted output unit with its emitted and skipped totals
   */
  recordUnit(outcome: UnitOutcome, features = 0, skipped = 0): void {
    this.units.set(outcome, (this.units.get(outcome) ?? 0) + 1);
    this.featuresEmitted += features;
    this.recordsSkipped += skipped;
  }

  getMetrics(): MetricsSnapshot {
    const toolCalls: Record<string, Record<string, number>> = {};
    this.toolCalls.forEach((outcomes, toolName) => {
      toolCalls[toolName] = Object.fromEntries(outcomes);
    });

    const latencies: Record<string, { avg: number; count: number }> = {};
    this.latencies.forEach((metric, toolName) => {
      latencies[toolName] = {
        avg: metric.count > 0 ? metric.sum / metric.count : 0,
        count: metric.count,
      };
    });

    return {
      toolCalls,
      latencies,
      units: Object.fromEntries(this.units),
      recordsSkipped: this.recordsSkipped,
      featuresEmitted: this.featuresEmitted,
    };
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP mcp_tool_calls_total Total number of MCP tool calls by tool name and outcome');
    lines.push('# TYPE mcp_tool_calls_total counter');
    this.toolCalls.forEach((outcomes, toolName) => {
      outcomes.forEach((count, outcome) => {
        lines.push(`mcp_tool_calls_total{tool_name="${toolName}",outcome="${outcome}"} ${count}`);
      });
    });

    lines.push('');
    lines.push('# HELP mcp_tool_latency_ms_avg Average latency of MCP tool calls in milliseconds');
    lines.push('# TYPE mcp_tool_latency_ms_avg gauge');
    this.latencies.forEach((metric, toolName) => {
      const avg = metric.count > 0 ? metric.sum / metric.count : 0;
      lines.push(`mcp_tool_latency_ms_avg{tool_name="${toolName}"} ${avg.toFixed(2)}`);
    });

    lines.push('');
    lines.push('# HELP ssr_units_total Output units processed by outcome');
    lines.push('# TYPE ssr_units_total counter');
    this.units.forEach((count, outcome) => {
      lines.push(`ssr_units_total{outcome="${outcome}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP ssr_features_emitted_total Place features written to output files');
    lines.push('# TYPE ssr_features_emitted_total counter');
    lines.push(`ssr_features_emitted_total ${this.featuresEmitted}`);

    lines.push('');
    lines.push('# HELP ssr_records_skipped_total Registry records skipped as malformed or of unknown type');
    lines.push('# TYPE ssr_records_skipped_total counter');
    lines.push(`ssr_records_skipped_total ${this.recordsSkipped}`);

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.toolCalls.clear();
    this.latencies.clear();
    this.units.clear();
    this.recordsSkipped = 0;
    this.featuresEmitted = 0;
  }
}

export const metrics = new MetricsCollector();
