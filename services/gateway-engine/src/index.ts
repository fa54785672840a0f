#!/usr/bin/env node

import { readFileSync, writeFileSync } from 'fs';

import {
  GATEWAY_PROFILES,
  isGatewayProfile,
  type GatewayProfile,
  type GatewayTemplateVariables,
} from '@hostgate/shared';

import { NginxAdapter } from './adapters/nginx-adapter.js';
import { SslAdapter } from './adapters/ssl-adapter.js';
import { env } from './core/env.js';
import { GatewayConfigError } from './core/errors.js';
import { verifyGatewayConfig } from './gateway/config-inspector.js';
import { renderGatewayTemplate } from './gateway/nginx-template.js';
import { buildRouteTable, resolveRoute } from './gateway/route-table.js';
import { writeMetricsTextfile } from './monitoring/metrics.js';
import { GatewayPipeline } from './pipeline/gateway-pipeline.js';

const args = process.argv.slice(2);
const command = args[0];

const log = (line: string) => console.log(line);

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: hostgate <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  routes            Show the route table of a profile');
  console.log('  template          Print the unsubstituted nginx template');
  console.log('  render            Substitute NODE_HOST/INSTALL_DIR and verify the result');
  console.log('  verify <file>     Check an nginx site file against a profile');
  console.log('  preflight         Check certificate and htpasswd files (production)');
  console.log('  apply             Render, install, nginx -t and reload');
  console.log('  certificate       Request the node host certificate with certbot');
  console.log('  check-upstreams   Wait for the supervisor and API ports to answer');
  console.log('');
  console.log('Options:');
  console.log(`  --profile <name>       ${GATEWAY_PROFILES.join(' | ')} (default: GATEWAY_PROFILE)`);
  console.log('  --node-host <host>     Overrides NODE_HOST');
  console.log('  --install-dir <dir>    Overrides INSTALL_DIR');
  console.log('  --out <file>           Write the template or rendered site to a file');
  console.log('  --path <path>          routes: show which location serves a request path');
  console.log('  --request-certificate  apply: run certbot first when the certificate is missing');
  console.log('  --wait-upstreams       apply: wait for the upstream ports after reload');
  console.log('  --timeout <seconds>    Upstream wait timeout (default: 20)');
}

function resolveProfile(): GatewayProfile {
  const value = getArg('--profile') ?? env.GATEWAY_PROFILE;
  if (!isGatewayProfile(value)) {
    throw new Error(`Invalid profile: ${value} (expected ${GATEWAY_PROFILES.join(' or ')})`);
  }
  return value;
}

function resolveVariables(): Partial<GatewayTemplateVariables> {
  const nodeHost = getArg('--node-host') ?? env.NODE_HOST;
  const installDir = getArg('--install-dir') ?? env.INSTALL_DIR;
  return {
    ...(nodeHost && { NODE_HOST: nodeHost }),
    ...(installDir && { INSTALL_DIR: installDir }),
  };
}

function resolveTimeout(): number {
  const raw = getArg('--timeout');
  if (raw === undefined) return 20;
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new Error(`Invalid --timeout: ${raw}`);
  }
  return seconds;
}

function emit(contents: string): void {
  const out = getArg('--out');
  if (out) {
    writeFileSync(out, contents, { encoding: 'utf8' });
    console.log(`Wrote ${out}`);
    return;
  }
  process.stdout.write(contents);
}

function cmdRoutes(): void {
  const profile = resolveProfile();
  const routes = buildRouteTable(profile, { dockerStaticRoot: env.DOCKER_STATIC_ROOT });

  const requestPath = getArg('--path');
  if (requestPath !== undefined) {
    const route = resolveRoute(routes, requestPath);
    console.log(route ? `${requestPath} -> location ${route.path}` : `${requestPath} matches no location`);
    return;
  }

  console.log(`Routes for the ${profile} profile:`);
  for (const route of routes) {
    const target = route.kind === 'static'
      ? `static ${route.root}`
      : `${route.upstream}${route.websocket ? ' (websocket)' : ''}`;
    console.log(`  ${route.path.padEnd(14)} ${target}${route.requiresAuth ? ' [basic auth]' : ''}`);
  }
}

function cmdTemplate(): void {
  const profile = resolveProfile();
  emit(renderGatewayTemplate(profile, new NginxAdapter().templateOptions()));
}

function cmdRender(): void {
  const rendered = new NginxAdapter().renderProfile(resolveProfile(), resolveVariables());
  emit(rendered.contents);
}

function cmdVerify(): void {
  const file = args[1];
  if (!file || file.startsWith('--')) {
    throw new Error('verify expects a file: hostgate verify <file> --profile <name>');
  }

  const profile = resolveProfile();
  const violations = verifyGatewayConfig(readFileSync(file, 'utf8'), profile, {
    supervisorPort: env.SUPERVISOR_PORT,
    apiPort: env.API_PORT,
  });
  if (violations.length > 0) {
    throw new GatewayConfigError(`${file} does not satisfy the ${profile} profile`, violations);
  }
  console.log(`${file}: ok (${profile})`);
}

function cmdPreflight(): void {
  const profile = resolveProfile();
  const findings = new GatewayPipeline().preflight(profile, resolveVariables());
  if (findings.length > 0) {
    throw new GatewayConfigError(`Preflight for the ${profile} profile failed`, findings);
  }
  console.log(`Preflight ok (${profile})`);
}

async function cmdApply(): Promise<void> {
  const profile = resolveProfile();
  const result = await new GatewayPipeline().execute({
    profile,
    variables: resolveVariables(),
    requestCertificate: hasFlag('--request-certificate'),
    waitForUpstreams: hasFlag('--wait-upstreams'),
    upstreamTimeoutSeconds: resolveTimeout(),
    onLog: log,
  });

  console.log(
    result.apply.changed
      ? `Applied ${profile} gateway to ${result.apply.configPath}`
      : `No changes to ${result.apply.configPath}`,
  );
  if (result.upstreams.some((check) => !check.reachable)) {
    process.exitCode = 2;
  }
}

async function cmdCertificate(): Promise<void> {
  const nodeHost = resolveVariables().NODE_HOST;
  if (!nodeHost) {
    throw new Error('NODE_HOST is not configured (set it or pass --node-host).');
  }
  const paths = await new SslAdapter().ensureCertificate(nodeHost, log);
  console.log(`Certificate: ${paths.certificate}`);
  console.log(`Key:         ${paths.key}`);
}

async function cmdCheckUpstreams(): Promise<void> {
  const checks = await new GatewayPipeline().checkUpstreams(resolveProfile(), log, resolveTimeout());
  for (const check of checks) {
    console.log(
      `  ${check.upstream.name.padEnd(11)} ${check.upstream.host}:${check.upstream.port}  ${check.reachable ? 'reachable' : 'unreachable'}`,
    );
  }
  if (checks.some((check) => !check.reachable)) {
    process.exitCode = 2;
  }
}

async function main(): Promise<void> {
  switch (command) {
    case 'routes':
      cmdRoutes();
      break;
    case 'template':
      cmdTemplate();
      break;
    case 'render':
      cmdRender();
      break;
    case 'verify':
      cmdVerify();
      break;
    case 'preflight':
      cmdPreflight();
      break;
    case 'apply':
      await cmdApply();
      break;
    case 'certificate':
      await cmdCertificate();
      break;
    case 'check-upstreams':
      await cmdCheckUpstreams();
      break;
    case undefined:
    case '--help':
    case '-h':
      printUsage();
      return;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exitCode = 1;
      return;
  }

  if (env.GATEWAY_METRICS_TEXTFILE) {
    await writeMetricsTextfile(env.GATEWAY_METRICS_TEXTFILE);
  }
}

main().catch(async (error: unknown) => {
  if (error instanceof GatewayConfigError) {
    console.error(`Error: ${error.summary}`);
    for (const violation of error.violations) {
      console.error(`  - ${violation}`);
    }
  } else {
    console.error(error instanceof Error ? `Error: ${error.message}` : error);
  }

  if (env.GATEWAY_METRICS_TEXTFILE) {
    await writeMetricsTextfile(env.GATEWAY_METRICS_TEXTFILE).catch((metricsError: unknown) => {
      console.warn('Could not write the metrics textfile', metricsError);
    });
  }
  process.exit(1);
});
