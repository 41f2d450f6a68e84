import { isIP } from 'net';

export type HostOriginVerdict =
  | { allowed: true }
  | { allowed: false; header: 'host' | 'origin'; value: string };

const LOOPBACK_NAMES = new Set(['localhost', '[::1]', '::1']);

/**
 * Strip an optional port from a Host header value. Bracketed IPv6 literals
 * keep their brackets.
 */
export function hostnameOf(hostHeader: string): string {
  const value = hostHeader.trim().toLowerCase();
  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    return end === -1 ? value : value.slice(0, end + 1);
  }
  // A bare IPv6 literal has more than one colon and no port
  if (value.indexOf(':') !== value.lastIndexOf(':')) {
    return value;
  }
  const colon = value.indexOf(':');
  return colon === -1 ? value : value.slice(0, colon);
}

function isLoopbackAddress(hostname: string): boolean {
  const bare = hostname.startsWith('[') && hostname.endsWith(']')
    ? hostname.slice(1, -1)
    : hostname;

  switch (isIP(bare)) {
    case 4:
      return bare.startsWith('127.');
    case 6:
      return bare === '::1' || bare === '0:0:0:0:0:0:0:1' || bare.startsWith('::ffff:127.');
    default:
      return false;
  }
}

/**
 * True for localhost, 127.0.0.0/8 and ::1, with or without a port.
 * `extraHosts` lists additional accepted host names (without port).
 */
export function isLoopbackHost(host: string, extraHosts: readonly string[] = []): boolean {
  const hostname = hostnameOf(host);
  if (hostname.length === 0) {
    return false;
  }
  if (LOOPBACK_NAMES.has(hostname) || isLoopbackAddress(hostname)) {
    return true;
  }
  return extraHosts.some((allowed) => allowed.toLowerCase() === hostname);
}

/**
 * Host must be loopback (or allow-listed). Origin may be absent; when present
 * it must parse as a URL whose host is loopback (or allow-listed).
 */
export function validateHostAndOrigin(
  host: string | undefined,
  origin: string | undefined,
  extraHosts: readonly string[] = [],
): HostOriginVerdict {
  if (host === undefined || !isLoopbackHost(host, extraHosts)) {
    return { allowed: false, header: 'host', value: host ?? '' };
  }

  if (origin === undefined) {
    return { allowed: true };
  }

  let originHost: string;
  try {
    originHost = new URL(origin).host;
  } catch {
    return { allowed: false, header: 'origin', value: origin };
  }

  if (!isLoopbackHost(originHost, extraHosts)) {
    return { allowed: false, header: 'origin', value: origin };
  }
  return { allowed: true };
}
