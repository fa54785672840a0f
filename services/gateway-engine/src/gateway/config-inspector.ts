import {
  DEFAULT_API_PORT,
  DEFAULT_SUPERVISOR_PORT,
  type GatewayProfile,
  type TemplateVariableName,
} from '@hostgate/shared';

import { NginxSyntaxError } from '../core/errors.js';
import { evaluateMap, type ConnectionUpgradeMap } from './connection-upgrade.js';
import { findDirective, findDirectives, parseNginxConfig, type NginxDirective } from './nginx-parser.js';
import { findTemplateVariables } from './template-variables.js';

export interface LocationSummary {
  path: string;
  line: number;
  requiresAuth: boolean;
  authUserFile: string | undefined;
  proxyPass: string | undefined;
  root: string | undefined;
  httpVersion: string | undefined;
  /** Effective proxy_set_header values, keyed by lower-cased header name. */
  proxyHeaders: Record<string, string>;
}

export interface ServerSummary {
  line: number;
  listen: string[];
  serverNames: string[];
  tls: boolean;
  certificate: string | undefined;
  certificateKey: string | undefined;
  redirect: { status: number; target: string } | undefined;
  locations: LocationSummary[];
}

export interface GatewayConfigSummary {
  servers: ServerSummary[];
  connectionUpgradeMap: ConnectionUpgradeMap | undefined;
  unresolvedVariables: TemplateVariableName[];
}

export interface VerifyOptions {
  supervisorPort?: number;
  apiPort?: number;
}

interface InheritedScope {
  authBasic: string | undefined;
  authUserFile: string | undefined;
  proxyHeaders: Record<string, string> | undefined;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const lastArg = (directives: readonly NginxDirective[], name: string): string | undefined =>
  findDirectives(directives, name).at(-1)?.args[0];

const collectProxyHeaders = (directives: readonly NginxDirective[]): Record<string, string> | undefined => {
  const headers = findDirectives(directives, 'proxy_set_header');
  if (headers.length === 0) {
    return undefined;
  }

  const result: Record<string, string> = {};
  for (const header of headers) {
    const [name, value = ''] = header.args;
    if (name) {
      result[name.toLowerCase()] = value;
    }
  }
  return result;
};

// nginx inherits auth_basic per directive, but proxy_set_header only as a
// whole set and only when the inner level defines none.
const scopeOf = (directives: readonly NginxDirective[], parent: InheritedScope): InheritedScope => ({
  authBasic: lastArg(directives, 'auth_basic') ?? parent.authBasic,
  authUserFile: lastArg(directives, 'auth_basic_user_file') ?? parent.authUserFile,
  proxyHeaders: collectProxyHeaders(directives) ?? parent.proxyHeaders,
});

const summarizeLocation = (directive: NginxDirective, parent: InheritedScope): LocationSummary => {
  const children = directive.block ?? [];
  const scope = scopeOf(children, parent);
  const requiresAuth =
    scope.authBasic !== undefined && scope.authBasic !== 'off' && scope.authUserFile !== undefined;

  return {
    // `location = /x` and `location ^~ /x` carry a modifier before the path.
    path: directive.args.at(-1) ?? '',
    line: directive.line,
    requiresAuth,
    authUserFile: requiresAuth ? scope.authUserFile : undefined,
    proxyPass: lastArg(children, 'proxy_pass'),
    root: lastArg(children, 'root') ?? lastArg(children, 'alias'),
    httpVersion: lastArg(children, 'proxy_http_version'),
    proxyHeaders: scope.proxyHeaders ?? {},
  };
};

const summarizeServer = (directive: NginxDirective, parent: InheritedScope): ServerSummary => {
  const children = directive.block ?? [];
  const scope = scopeOf(children, parent);
  const listen = findDirectives(children, 'listen').map((listenDirective) => listenDirective.args.join(' '));
  const sslFlag = lastArg(children, 'ssl');

  const returnDirective = findDirective(children, 'return');
  const status = Number(returnDirective?.args[0]);
  const target = returnDirective?.args[1];
  const redirect =
    returnDirective && REDIRECT_STATUSES.has(status) && target !== undefined
      ? { status, target }
      : undefined;

  return {
    line: directive.line,
    listen,
    serverNames: findDirectives(children, 'server_name').flatMap((name) => name.args),
    tls: sslFlag === 'on' || findDirectives(children, 'listen').some((item) => item.args.includes('ssl')),
    certificate: lastArg(children, 'ssl_certificate'),
    certificateKey: lastArg(children, 'ssl_certificate_key'),
    redirect,
    locations: findDirectives(children, 'location').map((location) => summarizeLocation(location, scope)),
  };
};

const summarizeConnectionUpgradeMap = (directive: NginxDirective): ConnectionUpgradeMap => {
  const entries: Record<string, string> = {};
  let defaultValue: string | undefined;

  for (const entry of directive.block ?? []) {
    const value = entry.args[0];
    if (value === undefined) {
      continue;
    }
    if (entry.name === 'default') {
      defaultValue = value;
    } else {
      entries[entry.name] = value;
    }
  }

  return {
    source: directive.args[0] ?? '',
    target: directive.args[1] ?? '',
    defaultValue,
    entries,
  };
};

/**
 * Summarize a site file. The file may be a bare site (included from the
 * http block) or a full nginx.conf with an `http { ... }` wrapper.
 */
export const inspectGatewayConfig = (text: string): GatewayConfigSummary => {
  const root = parseNginxConfig(text);
  const httpLevel = [
    ...root,
    ...findDirectives(root, 'http').flatMap((http) => http.block ?? []),
  ];
  const httpScope = scopeOf(httpLevel, {
    authBasic: undefined,
    authUserFile: undefined,
    proxyHeaders: undefined,
  });

  const mapDirective = findDirectives(httpLevel, 'map').find(
    (map) => map.args[0] === '$http_upgrade' && map.args[1] === '$connection_upgrade',
  );

  return {
    servers: findDirectives(httpLevel, 'server').map((server) => summarizeServer(server, httpScope)),
    connectionUpgradeMap: mapDirective ? summarizeConnectionUpgradeMap(mapDirective) : undefined,
    unresolvedVariables: findTemplateVariables(text),
  };
};

export const proxyTargetPort = (proxyPass: string | undefined): number | undefined => {
  const match = proxyPass?.match(/^https?:\/\/[^/:]+:(\d+)(?:\/|$)/);
  return match?.[1] ? Number(match[1]) : undefined;
};

/**
 * Check a rendered site against the guarantees of its profile. Returns one
 * message per violation; an empty list means the configuration passes.
 */
export const verifyGatewayConfig = (
  text: string,
  profile: GatewayProfile,
  options: VerifyOptions = {},
): string[] => {
  let summary: GatewayConfigSummary;
  try {
    summary = inspectGatewayConfig(text);
  } catch (error) {
    if (error instanceof NginxSyntaxError) {
      return [`syntax error: ${error.message}`];
    }
    throw error;
  }

  const supervisorPort = options.supervisorPort ?? DEFAULT_SUPERVISOR_PORT;
  const apiPort = options.apiPort ?? DEFAULT_API_PORT;
  const violations: string[] = summary.unresolvedVariables.map(
    (name) => `template variable \${${name}} is not substituted`,
  );

  const locations = summary.servers.flatMap((server) => server.locations);
  const locationAt = (path: string) => locations.find((location) => location.path === path);

  if (summary.servers.length === 0) {
    violations.push('no server block');
  }
  if (!locationAt('/')) {
    violations.push('location / is missing');
  }

  if (profile === 'production') {
    for (const location of locations.filter((item) => !item.requiresAuth)) {
      violations.push(`location ${location.path} does not require Basic Auth`);
    }

    const tlsServers = summary.servers.filter((server) => server.tls);
    if (tlsServers.length === 0) {
      violations.push('no server terminates TLS');
    }
    for (const server of tlsServers.filter((item) => !item.certificate || !item.certificateKey)) {
      violations.push(`TLS server at line ${server.line} has no certificate or key`);
    }
    const redirects = summary.servers.some(
      (server) => !server.tls && server.redirect?.target.startsWith('https://'),
    );
    if (!redirects) {
      violations.push('no HTTP server redirects to HTTPS');
    }

    const supervisor = locationAt('/supervisor/');
    if (!supervisor) {
      violations.push('location /supervisor/ is missing');
    } else if (proxyTargetPort(supervisor.proxyPass) !== supervisorPort) {
      violations.push(`location /supervisor/ does not proxy to port ${supervisorPort}`);
    }
  } else {
    for (const location of locations.filter((item) => item.requiresAuth)) {
      violations.push(`location ${location.path} requires Basic Auth`);
    }
    if (summary.servers.some((server) => server.tls)) {
      violations.push('docker profile must not terminate TLS');
    }
    if (locationAt('/supervisor/')) {
      violations.push('location /supervisor/ must not be exposed');
    }
  }

  const api = locationAt('/api/');
  if (!api) {
    violations.push('location /api/ is missing');
  } else if (proxyTargetPort(api.proxyPass) !== apiPort) {
    violations.push(`location /api/ does not proxy to port ${apiPort}`);
  }

  const websocket = locationAt('/api/ws/');
  if (!websocket) {
    violations.push('location /api/ws/ is missing');
  } else {
    if (proxyTargetPort(websocket.proxyPass) !== apiPort) {
      violations.push(`location /api/ws/ does not proxy to port ${apiPort}`);
    }
    if (websocket.httpVersion !== '1.1') {
      violations.push('location /api/ws/ does not use proxy_http_version 1.1');
    }
    if (websocket.proxyHeaders.upgrade !== '$http_upgrade') {
      violations.push('location /api/ws/ does not forward the Upgrade header');
    }
    if (websocket.proxyHeaders.connection !== '$connection_upgrade') {
      violations.push('location /api/ws/ does not set Connection from $connection_upgrade');
    }
  }

  for (const location of locations) {
    if (location.path !== '/api/ws/' && location.proxyHeaders.upgrade !== undefined) {
      violations.push(`location ${location.path} forwards the Upgrade header`);
    }
  }

  const map = summary.connectionUpgradeMap;
  if (!map) {
    violations.push('map $http_upgrade $connection_upgrade is missing');
  } else {
    if (evaluateMap(map, '') !== 'close') {
      violations.push('map does not resolve an empty Upgrade header to close');
    }
    // Every non-empty header must upgrade: the default and each explicit key.
    if (map.defaultValue !== 'upgrade') {
      violations.push('map does not resolve an Upgrade header to upgrade');
    }
    for (const [key, value] of Object.entries(map.entries)) {
      if (key !== '' && value !== 'upgrade') {
        violations.push(`map resolves Upgrade header "${key}" to ${value}`);
      }
    }
  }

  return violations;
};
