import { describe, expect, it } from 'vitest';

import { buildRouteTable, buildUpstreams, normalizeRequestPath, resolveRoute } from '../src/gateway/route-table.js';

describe('route table', () => {
  it('exposes all four prefixes behind Basic Auth in production', () => {
    const routes = buildRouteTable('production');

    expect(routes.map((route) => route.path)).toEqual(['/', '/supervisor/', '/api/', '/api/ws/']);
    expect(routes.every((route) => route.requiresAuth)).toBe(true);
    expect(routes[0]).toMatchObject({ kind: 'static', root: '${INSTALL_DIR}/www' });
  });

  it('drops the supervisor and auth in the docker profile', () => {
    const routes = buildRouteTable('docker');

    expect(routes.map((route) => route.path)).toEqual(['/', '/api/', '/api/ws/']);
    expect(routes.some((route) => route.requiresAuth)).toBe(false);
    expect(routes[0]).toMatchObject({ kind: 'static', root: '/usr/share/nginx/html' });
  });

  it('marks only /api/ws/ as a websocket route', () => {
    for (const profile of ['production', 'docker'] as const) {
      const websocketPaths = buildRouteTable(profile)
        .filter((route) => route.kind === 'proxy' && route.websocket)
        .map((route) => route.path);
      expect(websocketPaths).toEqual(['/api/ws/']);
    }
  });

  it('strips the prefix for the supervisor panel only', () => {
    const proxies = buildRouteTable('production').flatMap((route) =>
      route.kind === 'proxy' ? [[route.path, route.stripPrefix] as const] : [],
    );

    expect(proxies).toEqual([
      ['/supervisor/', true],
      ['/api/', false],
      ['/api/ws/', false],
    ]);
  });

  it('uses a custom docker static root and rejects unsafe ones', () => {
    expect(buildRouteTable('docker', { dockerStaticRoot: '/srv/www/' })[0]).toMatchObject({ root: '/srv/www' });
    expect(() => buildRouteTable('docker', { dockerStaticRoot: 'srv/www' })).toThrowError(
      'Invalid docker static root: srv/www',
    );
  });

  it('selects the longest matching prefix', () => {
    const production = buildRouteTable('production');
    const docker = buildRouteTable('docker');

    expect(resolveRoute(production, '/api/ws/stream?token=abc')?.path).toBe('/api/ws/');
    expect(resolveRoute(production, '/api/status')?.path).toBe('/api/');
    expect(resolveRoute(production, '/api')?.path).toBe('/');
    expect(resolveRoute(production, '/supervisor/index.html')?.path).toBe('/supervisor/');
    expect(resolveRoute(docker, '/supervisor/index.html')?.path).toBe('/');
    expect(resolveRoute(docker, 'relative')).toBeUndefined();
  });

  it('matches the path after nginx normalizes it', () => {
    const production = buildRouteTable('production');

    expect(resolveRoute(production, '/api//ws/stream')?.path).toBe('/api/ws/');
    expect(resolveRoute(production, '/api/%77s/stream')?.path).toBe('/api/ws/');
    expect(resolveRoute(production, '/api/ws/../status')?.path).toBe('/api/');
    expect(resolveRoute(production, '/api/./ws/stream')?.path).toBe('/api/ws/');
    expect(resolveRoute(production, '/../api/')).toBeUndefined();
  });
});

describe('normalizeRequestPath', () => {
  it('merges slashes, decodes escapes and resolves dot segments', () => {
    expect(normalizeRequestPath('/')).toBe('/');
    expect(normalizeRequestPath('//supervisor//')).toBe('/supervisor/');
    expect(normalizeRequestPath('/api/ws/..')).toBe('/api/');
    expect(normalizeRequestPath('/api/ws/.')).toBe('/api/ws/');
    expect(normalizeRequestPath('/api/%2e%2e/supervisor/?a=b')).toBe('/supervisor/');
    expect(normalizeRequestPath('/a/b/../../..')).toBeUndefined();
  });
});

describe('buildUpstreams', () => {
  it('defaults to the local supervisor and API ports', () => {
    expect(buildUpstreams()).toEqual({
      supervisor: { name: 'supervisor', host: '127.0.0.1', port: 9001 },
      api: { name: 'api', host: '127.0.0.1', port: 8001 },
    });
  });

  it('rejects ports outside the TCP range', () => {
    expect(() => buildUpstreams({ apiPort: 70000 })).toThrowError('Invalid api port: 70000');
    expect(() => buildUpstreams({ supervisorPort: 0 })).toThrowError('Invalid supervisor port: 0');
  });
});
