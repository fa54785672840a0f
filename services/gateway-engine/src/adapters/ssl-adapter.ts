import { existsSync } from 'fs';

import { env } from '../core/env.js';
import { assertCertificateHostname } from '../core/host-validation.js';
import type { LogCallback } from '../core/run-command.js';
import { runHostCommandStreaming, shellEscape } from '../core/run-host-command.js';

export interface CertificatePaths {
  certificate: string;
  key: string;
}

export class SslAdapter {
  certificatePaths(nodeHost: string): CertificatePaths {
    const host = assertCertificateHostname(nodeHost, 'NODE_HOST');
    const liveDir = `${env.LETSENCRYPT_LIVE_PATH}/${host}`;
    return {
      certificate: `${liveDir}/fullchain.pem`,
      key: `${liveDir}/privkey.pem`,
    };
  }

  /** Paths from `certificatePaths` that do not exist yet. */
  missingCertificateFiles(nodeHost: string): string[] {
    const paths = this.certificatePaths(nodeHost);
    return [paths.certificate, paths.key].filter((path) => !existsSync(path));
  }

  /**
   * Obtain (or keep) a certificate for the node host through certbot's nginx
   * plugin. Certbot renews on its own schedule afterwards.
   */
  async ensureCertificate(nodeHost: string, onLog?: LogCallback): Promise<CertificatePaths> {
    if (!env.CERTBOT_EMAIL) {
      throw new Error('CERTBOT_EMAIL is not configured.');
    }

    const host = assertCertificateHostname(nodeHost, 'NODE_HOST');
    const command = [
      'certbot certonly --nginx',
      '--non-interactive',
      '--agree-tos',
      '--keep-until-expiring',
      `--cert-name ${shellEscape(host)}`,
      `--email ${shellEscape(env.CERTBOT_EMAIL)}`,
      `-d ${shellEscape(host)}`,
    ].join(' ');

    await runHostCommandStreaming(command, onLog);
    return this.certificatePaths(host);
  }
}
