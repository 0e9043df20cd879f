/**
 * Metrics resource in Prometheus text format
 */

import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { metrics } from '../domain/metrics.js';

export const METRICS_RESOURCE_URI = 'ssr://metrics';
export const METRICS_RESOURCE_NAME = 'Server Metrics';
export const METRICS_RESOURCE_DESCRIPTION =
  'Tool calls, latency and conversion counters of this server in Prometheus text format';

export function readMetricsResource(): ReadResourceResult {
  return {
    contents: [
      {
        uri: METRICS_RESOURCE_URI,
        mimeType: 'text/plain',
        text: metrics.exportPrometheus(),
      },
    ],
  };
}
