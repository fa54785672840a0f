import { describe, expect, it } from 'vitest';

import {
  inspectGatewayConfig,
  proxyTargetPort,
  verifyGatewayConfig,
} from '../src/gateway/config-inspector.js';
import { renderGatewayTemplate } from '../src/gateway/nginx-template.js';
import { substituteTemplateVariables } from '../src/gateway/template-variables.js';

const variables = { NODE_HOST: 'node.example.com', INSTALL_DIR: '/opt/hostgate' };
const production = substituteTemplateVariables(renderGatewayTemplate('production'), variables);
const docker = substituteTemplateVariables(renderGatewayTemplate('docker'), variables);

describe('inspectGatewayConfig', () => {
  it('summarizes the production servers and locations', () => {
    const summary = inspectGatewayConfig(production);

    expect(summary.servers).toHaveLength(2);
    const [redirect, tls] = summary.servers;
    expect(redirect).toMatchObject({
      tls: false,
      serverNames: ['node.example.com'],
      redirect: { status: 301, target: 'https://$host$request_uri' },
      locations: [],
    });
    expect(tls).toMatchObject({
      tls: true,
      listen: ['443 ssl http2', '[::]:443 ssl http2'],
      certificate: '/etc/letsencrypt/live/node.example.com/fullchain.pem',
      certificateKey: '/etc/letsencrypt/live/node.example.com/privkey.pem',
    });
    expect(tls?.locations.map((location) => [location.path, location.requiresAuth, location.authUserFile])).toEqual([
      ['/', true, '/opt/hostgate/htpasswd'],
      ['/supervisor/', true, '/opt/hostgate/htpasswd'],
      ['/api/', true, '/opt/hostgate/htpasswd'],
      ['/api/ws/', true, '/opt/hostgate/htpasswd'],
    ]);
    expect(summary.connectionUpgradeMap).toEqual({
      source: '$http_upgrade',
      target: '$connection_upgrade',
      defaultValue: 'upgrade',
      entries: { '': 'close' },
    });
    expect(summary.unresolvedVariables).toEqual([]);
  });

  it('applies nginx inheritance for auth and proxy headers', () => {
    const summary = inspectGatewayConfig(
      [
        'http {',
        '  server {',
        '    listen 443 ssl;',
        '    auth_basic "Node";',
        '    auth_basic_user_file /opt/hostgate/htpasswd;',
        '    proxy_set_header Host $host;',
        '    location / { root /srv; }',
        '    location /api/ { auth_basic off; proxy_pass http://127.0.0.1:8001; }',
        '    location /api/ws/ { proxy_set_header Upgrade $http_upgrade; proxy_pass http://127.0.0.1:8001; }',
        '  }',
        '}',
      ].join('\n'),
    );

    const locations = summary.servers[0]?.locations ?? [];
    expect(locations.map((location) => [location.path, location.requiresAuth])).toEqual([
      ['/', true],
      ['/api/', false],
      ['/api/ws/', true],
    ]);
    expect(locations[0]?.proxyHeaders).toEqual({ host: '$host' });
    expect(locations[2]?.proxyHeaders).toEqual({ upgrade: '$http_upgrade' });
  });
});

describe('verifyGatewayConfig', () => {
  it('passes the rendered sites', () => {
    expect(verifyGatewayConfig(production, 'production')).toEqual([]);
    expect(verifyGatewayConfig(docker, 'docker')).toEqual([]);
  });

  it('flags auth, TLS and supervisor exposure in a docker site', () => {
    expect(verifyGatewayConfig(production, 'docker')).toEqual([
      'location / requires Basic Auth',
      'location /supervisor/ requires Basic Auth',
      'location /api/ requires Basic Auth',
      'location /api/ws/ requires Basic Auth',
      'docker profile must not terminate TLS',
      'location /supervisor/ must not be exposed',
    ]);
  });

  it('flags missing auth, TLS, redirect and supervisor in a production site', () => {
    expect(verifyGatewayConfig(docker, 'production')).toEqual([
      'location / does not require Basic Auth',
      'location /api/ does not require Basic Auth',
      'location /api/ws/ does not require Basic Auth',
      'no server terminates TLS',
      'no HTTP server redirects to HTTPS',
      'location /supervisor/ is missing',
    ]);
  });

  it('flags unsubstituted template variables', () => {
    expect(verifyGatewayConfig(renderGatewayTemplate('production'), 'production')).toEqual([
      'template variable ${NODE_HOST} is not substituted',
      'template variable ${INSTALL_DIR} is not substituted',
    ]);
  });

  it('requires the websocket location to pass the computed Connection value', () => {
    const broken = docker.replace(
      'proxy_set_header Connection $connection_upgrade;',
      'proxy_set_header Connection "upgrade";',
    );

    expect(verifyGatewayConfig(broken, 'docker')).toEqual([
      'location /api/ws/ does not set Connection from $connection_upgrade',
    ]);
  });

  it('flags Upgrade forwarding outside /api/ws/', () => {
    const leaking = docker.replace(
      '    proxy_set_header X-Forwarded-Proto $scheme;\n    proxy_pass http://127.0.0.1:8001;',
      '    proxy_set_header X-Forwarded-Proto $scheme;\n    proxy_set_header Upgrade $http_upgrade;\n    proxy_pass http://127.0.0.1:8001;',
    );

    expect(verifyGatewayConfig(leaking, 'docker')).toEqual(['location /api/ forwards the Upgrade header']);
  });

  it('checks the map resolves an empty Upgrade header to close', () => {
    const broken = docker.replace("  '' close;", "  '' upgrade;");

    expect(verifyGatewayConfig(broken, 'docker')).toEqual([
      'map does not resolve an empty Upgrade header to close',
    ]);
  });

  it('requires every non-empty Upgrade header to upgrade', () => {
    const closingDefault = docker.replace('  default upgrade;', '  default close;\n  websocket upgrade;');
    const closingKey = docker.replace("  '' close;", "  '' close;\n  h2c close;");

    expect(verifyGatewayConfig(closingDefault, 'docker')).toEqual([
      'map does not resolve an Upgrade header to upgrade',
    ]);
    expect(verifyGatewayConfig(closingKey, 'docker')).toEqual(['map resolves Upgrade header "h2c" to close']);
  });

  it('checks upstream ports against the configured ones', () => {
    expect(verifyGatewayConfig(docker, 'docker', { apiPort: 8101 })).toEqual([
      'location /api/ does not proxy to port 8101',
      'location /api/ws/ does not proxy to port 8101',
    ]);
  });

  it('reports syntax errors instead of throwing', () => {
    expect(verifyGatewayConfig('server {\n  listen 80;\n', 'docker')).toEqual([
      'syntax error: Block "server" is not closed (line 1)',
    ]);
  });
});

describe('proxyTargetPort', () => {
  it('reads the port of an http proxy target', () => {
    expect(proxyTargetPort('http://127.0.0.1:9001/')).toBe(9001);
    expect(proxyTargetPort('http://127.0.0.1:8001')).toBe(8001);
    expect(proxyTargetPort('http://api_upstream')).toBeUndefined();
    expect(proxyTargetPort(undefined)).toBeUndefined();
  });
});
