import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { gatewayRenderCounter, metricsRegistry, writeMetricsTextfile } from '../src/monitoring/metrics.js';

describe('writeMetricsTextfile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostgate-metrics-'));
    metricsRegistry.resetMetrics();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the registry in the text exposition format', async () => {
    gatewayRenderCounter.inc({ profile: 'docker', status: 'ok' });
    const path = join(dir, 'hostgate.prom');

    await writeMetricsTextfile(path);

    const lines = readFileSync(path, 'utf8').split('\n');
    expect(lines).toContain('# TYPE hostgate_gateway_render_total counter');
    expect(lines).toContain('hostgate_gateway_render_total{profile="docker",status="ok"} 1');
    expect(existsSync(path)).toBe(true);
    expect(readdirSync(dir)).toEqual(['hostgate.prom']);
  });
});
