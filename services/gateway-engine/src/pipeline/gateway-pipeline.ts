import { existsSync } from 'fs';
import { join } from 'path';

import type { GatewayProfile, GatewayTemplateVariables, UpstreamTarget } from '@hostgate/shared';

import {
  isReachableStatus,
  NginxAdapter,
  type ApplyResult,
  type UpstreamProbeResult,
} from '../adapters/nginx-adapter.js';
import { SslAdapter } from '../adapters/ssl-adapter.js';
import { env } from '../core/env.js';
import { GatewayConfigError } from '../core/errors.js';
import { assertInstallDir, isFullyQualifiedHostname } from '../core/host-validation.js';
import type { LogCallback } from '../core/run-command.js';
import { buildUpstreams } from '../gateway/route-table.js';

export interface GatewayRunOptions {
  profile: GatewayProfile;
  variables: Partial<GatewayTemplateVariables>;
  /** Run certbot first when the certificate files are missing (production only). */
  requestCertificate?: boolean;
  waitForUpstreams?: boolean;
  upstreamTimeoutSeconds?: number;
  onLog?: LogCallback;
}

export interface UpstreamCheck {
  upstream: UpstreamTarget;
  probe: UpstreamProbeResult;
  reachable: boolean;
}

export interface GatewayRunResult {
  apply: ApplyResult;
  upstreams: UpstreamCheck[];
}

export class GatewayPipeline {
  private readonly nginx = new NginxAdapter();

  private readonly ssl = new SslAdapter();

  /**
   * Check the files nginx will refuse to start without. Nothing is created
   * here: certificates come from certbot and the htpasswd file is managed
   * outside this tool.
   */
  preflight(profile: GatewayProfile, variables: Partial<GatewayTemplateVariables>): string[] {
    if (profile !== 'production') {
      return [];
    }

    const findings: string[] = [];
    const nodeHost = variables.NODE_HOST?.trim();
    const installDir = variables.INSTALL_DIR?.trim();

    if (!nodeHost) {
      findings.push('NODE_HOST is required for the production profile');
    } else if (!isFullyQualifiedHostname(nodeHost)) {
      findings.push(`NODE_HOST ${nodeHost} is not a fully qualified name a certificate can be issued for`);
    } else {
      for (const path of this.ssl.missingCertificateFiles(nodeHost)) {
        findings.push(`certificate file ${path} does not exist`);
      }
    }

    if (!installDir) {
      findings.push('INSTALL_DIR is required for the production profile');
    } else {
      const htpasswdPath = join(assertInstallDir(installDir), 'htpasswd');
      if (!existsSync(htpasswdPath)) {
        findings.push(`credential file ${htpasswdPath} does not exist`);
      }
    }

    return findings;
  }

  upstreamsFor(profile: GatewayProfile): UpstreamTarget[] {
    const upstreams = buildUpstreams({ supervisorPort: env.SUPERVISOR_PORT, apiPort: env.API_PORT });
    return profile === 'production' ? [upstreams.supervisor, upstreams.api] : [upstreams.api];
  }

  async checkUpstreams(
    profile: GatewayProfile,
    onLog?: LogCallback,
    timeoutSeconds = 20,
  ): Promise<UpstreamCheck[]> {
    const checks: UpstreamCheck[] = [];
    for (const upstream of this.upstreamsFor(profile)) {
      const probe = await this.nginx.waitForUpstreamReachable(upstream, onLog, timeoutSeconds);
      const reachable = probe.tcpReachable || isReachableStatus(probe.httpStatus);
      if (!reachable) {
        onLog?.(`Upstream ${upstream.name} (${upstream.host}:${upstream.port}) is not reachable`);
      }
      checks.push({ upstream, probe, reachable });
    }
    return checks;
  }

  async execute(options: GatewayRunOptions): Promise<GatewayRunResult> {
    const { profile, variables, onLog } = options;

    const nodeHost = variables.NODE_HOST?.trim();
    if (
      profile === 'production' &&
      options.requestCertificate &&
      nodeHost &&
      isFullyQualifiedHostname(nodeHost)
    ) {
      if (this.ssl.missingCertificateFiles(nodeHost).length > 0) {
        onLog?.(`Requesting a certificate for ${nodeHost}`);
        await this.ssl.ensureCertificate(nodeHost, onLog);
      }
    }

    const findings = this.preflight(profile, variables);
    if (findings.length > 0) {
      throw new GatewayConfigError(`Preflight for the ${profile} profile failed`, findings);
    }

    const apply = await this.nginx.applyProfile(profile, variables, onLog);
    const upstreams = options.waitForUpstreams
      ? await this.checkUpstreams(profile, onLog, options.upstreamTimeoutSeconds)
      : [];

    return { apply, upstreams };
  }
}
