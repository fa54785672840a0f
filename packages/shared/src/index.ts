export type GatewayProfile = 'production' | 'docker';

export const GATEWAY_PROFILES: readonly GatewayProfile[] = ['production', 'docker'];

export type UpstreamName = 'supervisor' | 'api';

export interface UpstreamTarget {
  name: UpstreamName;
  host: string;
  port: number;
}

export const DEFAULT_SUPERVISOR_PORT = 9001;
export const DEFAULT_API_PORT = 8001;

interface GatewayRouteBase {
  /** Prefix location, always starting and ending with a slash. */
  path: string;
  requiresAuth: boolean;
}

export interface StaticRoute extends GatewayRouteBase {
  kind: 'static';
  root: string;
  index: string[];
}

export interface ProxyRoute extends GatewayRouteBase {
  kind: 'proxy';
  upstream: UpstreamName;
  websocket: boolean;
  /** Pass the request URI without the location prefix. */
  stripPrefix: boolean;
}

export type GatewayRoute = StaticRoute | ProxyRoute;

export const TEMPLATE_VARIABLES = ['NODE_HOST', 'INSTALL_DIR'] as const;

export type TemplateVariableName = (typeof TEMPLATE_VARIABLES)[number];

export type GatewayTemplateVariables = Record<TemplateVariableName, string>;

export interface RenderedGatewayConfig {
  profile: GatewayProfile;
  fileName: string;
  contents: string;
}

export const isGatewayProfile = (value: unknown): value is GatewayProfile =>
  GATEWAY_PROFILES.some((profile) => profile === value);
