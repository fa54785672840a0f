import {
  DEFAULT_API_PORT,
  DEFAULT_SUPERVISOR_PORT,
  type GatewayProfile,
  type GatewayRoute,
  type UpstreamName,
  type UpstreamTarget,
} from '@hostgate/shared';

import { assertInstallDir, assertValidPort, assertValidUpstreamHost } from '../core/host-validation.js';

export interface RouteTableOptions {
  /** Document root for `/` in the docker profile. */
  dockerStaticRoot?: string;
}

export interface UpstreamOptions {
  host?: string;
  supervisorPort?: number;
  apiPort?: number;
}

export type UpstreamMap = Record<UpstreamName, UpstreamTarget>;

export const DEFAULT_DOCKER_STATIC_ROOT = '/usr/share/nginx/html';

// Left unresolved here; the substitution step fills it in.
const PRODUCTION_STATIC_ROOT = '${INSTALL_DIR}/www';

export const buildUpstreams = (options: UpstreamOptions = {}): UpstreamMap => {
  const host = assertValidUpstreamHost(options.host ?? '127.0.0.1');
  return {
    supervisor: {
      name: 'supervisor',
      host,
      port: assertValidPort(options.supervisorPort ?? DEFAULT_SUPERVISOR_PORT, 'supervisor port'),
    },
    api: {
      name: 'api',
      host,
      port: assertValidPort(options.apiPort ?? DEFAULT_API_PORT, 'api port'),
    },
  };
};

export const buildRouteTable = (
  profile: GatewayProfile,
  options: RouteTableOptions = {},
): GatewayRoute[] => {
  const requiresAuth = profile === 'production';
  const root = profile === 'production'
    ? PRODUCTION_STATIC_ROOT
    : assertInstallDir(options.dockerStaticRoot ?? DEFAULT_DOCKER_STATIC_ROOT, 'docker static root');

  const routes: GatewayRoute[] = [
    { kind: 'static', path: '/', root, index: ['index.html'], requiresAuth },
  ];

  if (profile === 'production') {
    routes.push({
      kind: 'proxy',
      path: '/supervisor/',
      upstream: 'supervisor',
      websocket: false,
      stripPrefix: true,
      requiresAuth,
    });
  }

  routes.push(
    { kind: 'proxy', path: '/api/', upstream: 'api', websocket: false, stripPrefix: false, requiresAuth },
    { kind: 'proxy', path: '/api/ws/', upstream: 'api', websocket: true, stripPrefix: false, requiresAuth },
  );

  return routes;
};

const decodePercent = (path: string): string =>
  path.replace(/%([0-9a-f]{2})/gi, (_match: string, hex: string) => String.fromCharCode(parseInt(hex, 16)));

/**
 * Normalize a request path the way nginx does before location matching:
 * the query is cut off, `%XX` escapes are decoded, repeated slashes merge
 * and `.` / `..` segments are resolved. Returns undefined for paths nginx
 * rejects with 400 (relative, or climbing above the root).
 */
export const normalizeRequestPath = (requestPath: string): string | undefined => {
  const raw = requestPath.split(/[?#]/, 1)[0] ?? '';
  if (!raw.startsWith('/')) {
    return undefined;
  }

  const parts = decodePercent(raw).split('/').slice(1);
  const segments: string[] = [];
  for (const part of parts) {
    if (part === '..') {
      if (segments.length === 0) {
        return undefined;
      }
      segments.pop();
    } else if (part !== '' && part !== '.') {
      segments.push(part);
    }
  }

  const path = `/${segments.join('/')}`;
  const endsInDirectory = ['', '.', '..'].includes(parts.at(-1) ?? '');
  return endsInDirectory && segments.length > 0 ? `${path}/` : path;
};

/**
 * Pick the route nginx would serve a request from: the longest prefix
 * location that matches the normalized path.
 */
export const resolveRoute = (
  routes: readonly GatewayRoute[],
  requestPath: string,
): GatewayRoute | undefined => {
  const path = normalizeRequestPath(requestPath);
  if (path === undefined) {
    return undefined;
  }

  let best: GatewayRoute | undefined;
  for (const route of routes) {
    if (path.startsWith(route.path) && (!best || route.path.length > best.path.length)) {
      best = route;
    }
  }
  return best;
};
