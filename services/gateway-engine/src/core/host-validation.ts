// RFC 1123 labels; a single label such as `localhost` is a valid host name.
const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/i;

const FQDN_PATTERN =
  /^(?=.{1,253}$)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

const UPSTREAM_HOST_PATTERN = /^(?:localhost|(?:\d{1,3}\.){3}\d{1,3}|[a-z0-9.-]+)$/i;

// Characters that would end or escape an nginx directive argument.
const UNSAFE_PATH_PATTERN = /[\s;{}'"$\\#]/;

export const normalizeHostname = (value: string): string =>
  value.trim().toLowerCase().replace(/\.$/, '');

export const assertValidHostname = (
  value: string,
  label = 'hostname',
): string => {
  const normalized = normalizeHostname(value);
  if (!HOSTNAME_PATTERN.test(normalized)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return normalized;
};

/** Public DNS name with a TLD, as certificate authorities require. */
export const isFullyQualifiedHostname = (value: string): boolean =>
  FQDN_PATTERN.test(normalizeHostname(value));

export const assertCertificateHostname = (value: string, label = 'certificate host'): string => {
  const normalized = assertValidHostname(value, label);
  if (!FQDN_PATTERN.test(normalized)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return normalized;
};

export const assertValidUpstreamHost = (value: string): string => {
  const host = value.trim();
  if (!UPSTREAM_HOST_PATTERN.test(host)) {
    throw new Error(`Invalid upstream host: ${value}`);
  }
  return host;
};

export const assertValidPort = (value: number, label = 'port'): number => {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return value;
};

/**
 * Absolute directory path usable verbatim inside an nginx directive.
 * Trailing slashes are dropped so `${INSTALL_DIR}/htpasswd` stays clean,
 * which leaves nothing of the filesystem root: `/` is rejected.
 */
export const assertInstallDir = (value: string, label = 'INSTALL_DIR'): string => {
  const trimmed = value.trim();
  const directory = trimmed.replace(/\/+$/, '');
  if (
    !trimmed.startsWith('/') ||
    !directory ||
    UNSAFE_PATH_PATTERN.test(trimmed) ||
    trimmed.includes('..')
  ) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return directory;
};
