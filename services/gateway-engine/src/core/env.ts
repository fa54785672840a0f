import 'dotenv/config';

import { z } from 'zod';

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().optional());

const optionalEmail = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().email().optional());

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  NODE_HOST: optionalString,
  INSTALL_DIR: optionalString,
  GATEWAY_PROFILE: z.enum(['production', 'docker']).default('production'),
  GATEWAY_SITE_NAME: z
    .string()
    .regex(/^[a-z0-9][a-z0-9._-]*$/i, 'must be a plain file name')
    .default('hostgate'),
  NGINX_SITES_PATH: z.string().default('/etc/nginx/sites-enabled'),
  NGINX_TEMPLATE_PATH: optionalString,
  NGINX_ERROR_LOG_PATH: z.string().default('/var/log/nginx/error.log'),
  LETSENCRYPT_LIVE_PATH: z.string().default('/etc/letsencrypt/live'),
  NGINX_HTTP2_STYLE: z.enum(['listen', 'directive']).default('listen'),
  DOCKER_STATIC_ROOT: z.string().default('/usr/share/nginx/html'),
  SUPERVISOR_PORT: z.coerce.number().int().min(1).max(65535).default(9001),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  CERTBOT_EMAIL: optionalEmail,
  GATEWAY_RELOAD_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  GATEWAY_METRICS_TEXTFILE: optionalString,
});

const parsed = schema.parse(process.env);

export const env = {
  ...parsed,
  LETSENCRYPT_LIVE_PATH: parsed.LETSENCRYPT_LIVE_PATH.replace(/\/+$/, ''),
};
