import { Request } from 'express';

/** Strips the IPv4-mapped IPv6 prefix, e.g. "::ffff:203.0.113.7" -> "203.0.113.7". */
export function normalizeIp(ip: string): string {
  return ip.trim().replace(/^::ffff:/i, '');
}

/**
 * The address the request came from as Express sees it: the socket address, or the
 * forwarded address only when `trust proxy` is configured. Use this for security
 * decisions; a client can put anything in X-Forwarded-For.
 */
export function getRequestIp(req: Request): string {
  return normalizeIp(req.ip || req.socket.remoteAddress || '');
}

/**
 * The caller's address for geolocation: the first entry of X-Forwarded-For when a proxy set it,
 * otherwise the socket's remote address.
 */
export function getClientIp(req: Request): string | undefined {
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const first = header?.split(',')[0]?.trim();
  if (first) {
    return normalizeIp(first);
  }

  const remote = req.socket.remoteAddress;
  return remote ? normalizeIp(remote) : undefined;
}

/**
 * Loopback, private and link-local addresses mean nothing to a public
 * geolocation service.
 */
export function isPrivateIp(ip: string): boolean {
  const lower = ip.toLowerCase();
  if (lower === '::1' || lower === 'localhost' || lower.startsWith('fe80:') || /^f[cd]/.test(lower)) {
    return true;
  }

  const octets = lower.split('.').map(Number);
  if (octets.length !== 4 || octets.some(octet => !Number.isInteger(octet))) {
    return false;
  }

  const [a, b] = octets;
  return (
    a === 127 ||
    a === 10 ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    (a === 169 && b === 254) ||
    a === 0
  );
}

/** The IP to geolocate, or undefined to let the service infer the caller. */
export function getGeolocatableIp(req: Request): string | undefined {
  const ip = getClientIp(req);
  return ip && !isPrivateIp(ip) ? ip : undefined;
}
