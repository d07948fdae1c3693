/**
 * Call counters collected through the client's request/response hooks.
 *
 * @example
 * ```typescript
 * const session = useMetrics(client);
 * await client.generateMany(prompts);
 * const { requestsCount, charsPerSecond } = session.stop();
 * ```
 *
 * @module
 */

import type { LLMClient } from './client.js';

export interface LLMMetrics {
  /** Calls started, cache hits included. */
  requestsCount: number;
  /** Calls that produced a response. */
  succeededCount: number;
  /** Characters of response text. */
  generatedChars: number;
  /** Sum of `genDuration` over successful calls, in seconds. */
  totalGenDuration: number;
  avgGenDuration: number;
  charsPerSecond: number;
  /** Wall time from attach to {@link MetricsSession.stop}, in seconds. */
  execDuration: number;
}

export interface MetricsSession {
  /** Live counters; updated after every call until stopped. */
  readonly metrics: Readonly<LLMMetrics>;
  /** Detach the hooks, fix `execDuration` and return the final counters. */
  stop(): Readonly<LLMMetrics>;
}

export function useMetrics(client: LLMClient): MetricsSession {
  const started = performance.now();
  const metrics: LLMMetrics = {
    requestsCount: 0,
    succeededCount: 0,
    generatedChars: 0,
    totalGenDuration: 0,
    avgGenDuration: 0,
    charsPerSecond: 0,
    execDuration: 0,
  };

  const offRequest = client.onRequest(() => {
    metrics.requestsCount++;
  });
  const offResponse = client.onResponse((response) => {
    metrics.succeededCount++;
    metrics.generatedChars += response.text.length;
    metrics.totalGenDuration += response.genDuration ?? 0;
    metrics.avgGenDuration = metrics.totalGenDuration / metrics.succeededCount;
    metrics.charsPerSecond = (metrics.generatedChars || 1) / (metrics.totalGenDuration || 1);
  });

  let stopped = false;
  return {
    metrics,
    stop() {
      if (!stopped) {
        stopped = true;
        offRequest();
        offResponse();
        metrics.execDuration = (performance.now() - started) / 1000;
      }
      return metrics;
    },
  };
}
