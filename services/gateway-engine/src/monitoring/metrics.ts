import { renameSync, writeFileSync } from 'fs';

import client from 'prom-client';

export const gatewayRenderCounter = new client.Counter({
  name: 'hostgate_gateway_render_total',
  help: 'Gateway configurations rendered, by profile and outcome',
  labelNames: ['profile', 'status'] as const,
});

export const gatewayApplyCounter = new client.Counter({
  name: 'hostgate_gateway_apply_total',
  help: 'Gateway configurations installed into nginx, by profile and outcome',
  labelNames: ['profile', 'status'] as const,
});

export const gatewayApplyDurationHistogram = new client.Histogram({
  name: 'hostgate_gateway_apply_duration_seconds',
  help: 'Duration of write, nginx -t and reload',
  labelNames: ['profile'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export const metricsRegistry = client.register;

/**
 * Dump the registry for the node-exporter textfile collector. The file is
 * replaced atomically so the collector never reads a partial write.
 */
export const writeMetricsTextfile = async (path: string): Promise<void> => {
  const body = await metricsRegistry.metrics();
  const tempPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tempPath, body, { encoding: 'utf8' });
  renameSync(tempPath, path);
};
