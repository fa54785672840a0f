import { existsSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';

import type {
  GatewayProfile,
  GatewayTemplateVariables,
  RenderedGatewayConfig,
  UpstreamTarget,
} from '@hostgate/shared';

import { env } from '../core/env.js';
import { GatewayConfigError } from '../core/errors.js';
import { assertValidPort, assertValidUpstreamHost } from '../core/host-validation.js';
import { withRetry } from '../core/retry.js';
import { runCommand, type LogCallback } from '../core/run-command.js';
import { runHostCommand, shellEscape } from '../core/run-host-command.js';
import { verifyGatewayConfig } from '../gateway/config-inspector.js';
import { renderGatewayTemplate, type GatewayTemplateOptions } from '../gateway/nginx-template.js';
import { buildUpstreams } from '../gateway/route-table.js';
import { substituteTemplateVariables } from '../gateway/template-variables.js';
import {
  gatewayApplyCounter,
  gatewayApplyDurationHistogram,
  gatewayRenderCounter,
} from '../monitoring/metrics.js';

export interface ApplyResult {
  configPath: string;
  rendered: RenderedGatewayConfig;
  changed: boolean;
}

export interface UpstreamProbeResult {
  httpStatus: string;
  tcpReachable: boolean;
}

export const isReachableStatus = (status: string): boolean =>
  status !== '000' && status !== '502' && status !== '503' && status !== '504';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class NginxAdapter {
  templateOptions(): GatewayTemplateOptions {
    return {
      upstreams: buildUpstreams({ supervisorPort: env.SUPERVISOR_PORT, apiPort: env.API_PORT }),
      dockerStaticRoot: env.DOCKER_STATIC_ROOT,
      letsencryptLivePath: env.LETSENCRYPT_LIVE_PATH,
      http2Style: env.NGINX_HTTP2_STYLE,
    };
  }

  /** Built-in template for the profile, or the file at NGINX_TEMPLATE_PATH. */
  loadTemplate(profile: GatewayProfile): string {
    if (env.NGINX_TEMPLATE_PATH) {
      try {
        return readFileSync(env.NGINX_TEMPLATE_PATH, 'utf8');
      } catch (error) {
        console.warn(
          `Could not read NGINX_TEMPLATE_PATH ${env.NGINX_TEMPLATE_PATH} (${errorMessage(error)}), using the built-in ${profile} template`,
        );
      }
    }

    return renderGatewayTemplate(profile, this.templateOptions());
  }

  renderProfile(
    profile: GatewayProfile,
    variables: Partial<GatewayTemplateVariables>,
  ): RenderedGatewayConfig {
    try {
      const contents = substituteTemplateVariables(this.loadTemplate(profile), variables);
      const violations = verifyGatewayConfig(contents, profile, {
        supervisorPort: env.SUPERVISOR_PORT,
        apiPort: env.API_PORT,
      });
      if (violations.length > 0) {
        throw new GatewayConfigError(`Rendered ${profile} configuration is invalid`, violations);
      }

      gatewayRenderCounter.inc({ profile, status: 'ok' });
      return { profile, fileName: `${env.GATEWAY_SITE_NAME}.conf`, contents };
    } catch (error) {
      gatewayRenderCounter.inc({ profile, status: 'error' });
      throw error;
    }
  }

  /**
   * Install the rendered site, validate it with `nginx -t` and reload nginx.
   * A rejected configuration is rolled back before the error is raised, so
   * the running nginx keeps serving the previous site.
   */
  async applyProfile(
    profile: GatewayProfile,
    variables: Partial<GatewayTemplateVariables>,
    onLog?: LogCallback,
  ): Promise<ApplyResult> {
    const endTimer = gatewayApplyDurationHistogram.startTimer({ profile });
    try {
      const result = await this.installAndReload(profile, variables, onLog);
      gatewayApplyCounter.inc({ profile, status: result.changed ? 'applied' : 'unchanged' });
      return result;
    } catch (error) {
      gatewayApplyCounter.inc({ profile, status: 'error' });
      throw error;
    } finally {
      endTimer();
    }
  }

  async waitForUpstreamReachable(
    upstream: UpstreamTarget,
    onLog?: LogCallback,
    timeoutSeconds = 20,
  ): Promise<UpstreamProbeResult> {
    const host = assertValidUpstreamHost(upstream.host);
    const port = assertValidPort(upstream.port, `${upstream.name} port`);

    const maxAttempts = Math.max(1, timeoutSeconds);
    let last: UpstreamProbeResult = { httpStatus: '000', tcpReachable: false };

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const probe = await this.probeUpstream(host, port);
      last = probe;

      if (probe.tcpReachable || isReachableStatus(probe.httpStatus)) {
        return probe;
      }

      if (attempt === 1 || attempt % 5 === 0 || attempt === maxAttempts) {
        onLog?.(
          `Upstream check: waiting for ${upstream.name} at ${host}:${port} (attempt ${attempt}/${maxAttempts}, http=${probe.httpStatus}, tcp=${probe.tcpReachable ? 'ok' : 'down'})`,
        );
      }

      if (attempt < maxAttempts) {
        await new Promise((resolve) => setTimeout(resolve, 1000));
      }
    }

    return last;
  }

  async getNginxErrorLogTail(lines = 60): Promise<string> {
    const safeLines = Math.max(1, Math.min(500, Math.trunc(lines) || 60));
    try {
      return await runHostCommand(
        `tail -n ${safeLines} ${shellEscape(env.NGINX_ERROR_LOG_PATH)} 2>/dev/null || true`,
      );
    } catch (error) {
      console.warn(`Could not read the nginx error log: ${errorMessage(error)}`);
      return '';
    }
  }

  private async installAndReload(
    profile: GatewayProfile,
    variables: Partial<GatewayTemplateVariables>,
    onLog?: LogCallback,
  ): Promise<ApplyResult> {
    const rendered = this.renderProfile(profile, variables);
    const configPath = join(env.NGINX_SITES_PATH, rendered.fileName);
    const previous = existsSync(configPath) ? readFileSync(configPath, 'utf8') : undefined;

    if (previous === rendered.contents) {
      onLog?.(`${configPath} is up to date`);
      return { configPath, rendered, changed: false };
    }

    writeFileSync(configPath, rendered.contents, { encoding: 'utf8' });
    onLog?.(`Wrote ${configPath}`);

    try {
      await this.runNginxCommand(profile, 'nginx -t');
    } catch (error) {
      const rollbackError = this.restore(configPath, previous);
      onLog?.(
        rollbackError === undefined
          ? `nginx -t failed, restored the previous ${configPath}`
          : `nginx -t failed and ${configPath} could not be rolled back`,
      );
      const tail = (await this.getNginxErrorLogTail(20)).trim();
      throw new GatewayConfigError('nginx rejected the configuration', [
        errorMessage(error),
        ...(rollbackError === undefined ? [] : [`rollback of ${configPath} failed: ${rollbackError}`]),
        ...(tail ? [`error log:\n${tail}`] : []),
      ]);
    }

    await withRetry(() => this.runNginxCommand(profile, this.reloadCommand(profile)), {
      retries: env.GATEWAY_RELOAD_RETRIES,
      delayMs: 500,
      onRetry: (error, attempt, delayMs) => {
        onLog?.(`nginx reload failed (${errorMessage(error)}), retry ${attempt} in ${delayMs}ms`);
      },
    });
    onLog?.('nginx reloaded');

    return { configPath, rendered, changed: true };
  }

  private reloadCommand(profile: GatewayProfile): string {
    return profile === 'docker' ? 'nginx -s reload' : 'systemctl reload nginx';
  }

  // In the docker profile nginx runs beside the engine in the same container.
  private runNginxCommand(profile: GatewayProfile, command: string): Promise<string> {
    return profile === 'docker' ? runCommand(command) : runHostCommand(command);
  }

  /** Put the previous site back; returns the failure message, if any. */
  private restore(configPath: string, previous: string | undefined): string | undefined {
    try {
      if (previous === undefined) {
        unlinkSync(configPath);
      } else {
        writeFileSync(configPath, previous, { encoding: 'utf8' });
      }
      return undefined;
    } catch (error) {
      return errorMessage(error);
    }
  }

  private async probeUpstream(host: string, port: number): Promise<UpstreamProbeResult> {
    const probeScript = [
      `HTTP_CODE="000"`,
      `TCP_OK="0"`,
      `if command -v curl >/dev/null 2>&1; then`,
      `  HTTP_CODE=$(curl -sS -o /dev/null -w "%{http_code}" --max-time 2 "http://${host}:${port}/" || true)`,
      `  [ -z "$HTTP_CODE" ] && HTTP_CODE=000`,
      `fi`,
      `if command -v nc >/dev/null 2>&1; then`,
      `  nc -z -w2 ${host} ${port} && TCP_OK=1 || TCP_OK=0`,
      `fi`,
      `echo "\${HTTP_CODE} \${TCP_OK}"`,
    ].join('\n');

    try {
      const raw = await runHostCommand(probeScript);
      const [httpStatus = '000', tcpRaw = '0'] = raw.trim().split(/\s+/);
      return { httpStatus, tcpReachable: tcpRaw === '1' };
    } catch (error) {
      console.warn(`Upstream probe for ${host}:${port} failed: ${errorMessage(error)}`);
      return { httpStatus: '000', tcpReachable: false };
    }
  }
}
