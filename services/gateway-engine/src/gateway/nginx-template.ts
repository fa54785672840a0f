import type { GatewayProfile, GatewayRoute, ProxyRoute, StaticRoute } from '@hostgate/shared';

import { assertInstallDir } from '../core/host-validation.js';
import { renderConnectionUpgradeMap } from './connection-upgrade.js';
import { buildRouteTable, buildUpstreams, type UpstreamMap } from './route-table.js';

export interface GatewayTemplateOptions {
  upstreams?: UpstreamMap;
  dockerStaticRoot?: string;
  letsencryptLivePath?: string;
  authRealm?: string;
  /**
   * `listen 443 ssl http2` works on every nginx but warns from 1.25.1 on;
   * `directive` emits `http2 on;`, which older releases reject.
   */
  http2Style?: Http2Style;
}

export type Http2Style = 'listen' | 'directive';

const INDENT = '  ';
const WEBSOCKET_TIMEOUT = '3600s';

export const DEFAULT_LETSENCRYPT_LIVE_PATH = '/etc/letsencrypt/live';
export const HTPASSWD_PATH = '${INSTALL_DIR}/htpasswd';

const indent = (lines: string[], depth = 1): string[] =>
  lines.map((line) => (line ? `${INDENT.repeat(depth)}${line}` : line));

const renderAuthDirectives = (route: GatewayRoute, realm: string): string[] =>
  route.requiresAuth
    ? [`auth_basic "${realm}";`, `auth_basic_user_file ${HTPASSWD_PATH};`]
    : [];

const renderStaticLocation = (route: StaticRoute, realm: string): string[] => [
  `location ${route.path} {`,
  ...indent([
    ...renderAuthDirectives(route, realm),
    `root ${route.root};`,
    `index ${route.index.join(' ')};`,
    'try_files $uri $uri/ =404;',
  ]),
  '}',
];

const renderProxyLocation = (route: ProxyRoute, upstreams: UpstreamMap, realm: string): string[] => {
  const upstream = upstreams[route.upstream];
  const target = `http://${upstream.host}:${upstream.port}${route.stripPrefix ? '/' : ''}`;

  const websocketDirectives = route.websocket
    ? [
        'proxy_set_header Upgrade $http_upgrade;',
        'proxy_set_header Connection $connection_upgrade;',
        `proxy_read_timeout ${WEBSOCKET_TIMEOUT};`,
        `proxy_send_timeout ${WEBSOCKET_TIMEOUT};`,
      ]
    : [];

  return [
    `location ${route.path} {`,
    ...indent([
      ...renderAuthDirectives(route, realm),
      'proxy_http_version 1.1;',
      'proxy_set_header Host $host;',
      'proxy_set_header X-Real-IP $remote_addr;',
      'proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
      'proxy_set_header X-Forwarded-Proto $scheme;',
      ...websocketDirectives,
      `proxy_pass ${target};`,
    ]),
    '}',
  ];
};

const renderLocations = (routes: GatewayRoute[], upstreams: UpstreamMap, realm: string): string[] =>
  routes.flatMap((route, index) => [
    ...(index > 0 ? [''] : []),
    ...(route.kind === 'static'
      ? renderStaticLocation(route, realm)
      : renderProxyLocation(route, upstreams, realm)),
  ]);

const renderProductionServers = (
  routes: GatewayRoute[],
  upstreams: UpstreamMap,
  options: GatewayTemplateOptions,
): string[] => {
  const livePath = assertInstallDir(
    options.letsencryptLivePath ?? DEFAULT_LETSENCRYPT_LIVE_PATH,
    'certificate directory',
  );
  const realm = options.authRealm ?? 'Restricted';
  // nginx has no escape for `$` inside quoted strings.
  if (!realm.trim() || /["$\\\r\n]/.test(realm)) {
    throw new Error(`Invalid auth realm: ${realm}`);
  }

  const tlsListen = options.http2Style === 'directive'
    ? ['listen 443 ssl;', 'listen [::]:443 ssl;', 'http2 on;']
    : ['listen 443 ssl http2;', 'listen [::]:443 ssl http2;'];

  return [
    'server {',
    ...indent([
      'listen 80;',
      'listen [::]:80;',
      'server_name ${NODE_HOST};',
      'server_tokens off;',
      '',
      'return 301 https://$host$request_uri;',
    ]),
    '}',
    '',
    'server {',
    ...indent([
      ...tlsListen,
      'server_name ${NODE_HOST};',
      'server_tokens off;',
      '',
      `ssl_certificate ${livePath}/\${NODE_HOST}/fullchain.pem;`,
      `ssl_certificate_key ${livePath}/\${NODE_HOST}/privkey.pem;`,
      'add_header Strict-Transport-Security "max-age=31536000; includeSubDomains" always;',
      '',
      ...renderLocations(routes, upstreams, realm),
    ]),
    '}',
  ];
};

const renderDockerServer = (routes: GatewayRoute[], upstreams: UpstreamMap): string[] => [
  'server {',
  ...indent([
    'listen 80 default_server;',
    'listen [::]:80 default_server;',
    'server_name ${NODE_HOST};',
    'server_tokens off;',
    '',
    ...renderLocations(routes, upstreams, ''),
  ]),
  '}',
];

/**
 * Render the nginx site for a profile. Host name and install directory are
 * left as `${NODE_HOST}` and `${INSTALL_DIR}` for the substitution step.
 */
export const renderGatewayTemplate = (
  profile: GatewayProfile,
  options: GatewayTemplateOptions = {},
): string => {
  const upstreams = options.upstreams ?? buildUpstreams();
  const routes = buildRouteTable(profile, { dockerStaticRoot: options.dockerStaticRoot });

  const servers = profile === 'production'
    ? renderProductionServers(routes, upstreams, options)
    : renderDockerServer(routes, upstreams);

  return [renderConnectionUpgradeMap(), '', ...servers, ''].join('\n');
};
