import { networkInterfaces } from 'node:os';

export function defaultLocalIp(): string {
  const nets = networkInterfaces();
  for (const name of Object.keys(nets)) {
    for (const net of nets[name] || []) {
      if (!net || net.internal) {
        continue;
      }
      if (net.family === 'IPv4' && net.address) {
        return net.address;
      }
    }
  }
  return '';
}

/**
 * Picks the address cast devices should use to reach the media server.
 * An explicit advertised address wins; a wildcard bind falls back to the first LAN IPv4.
 */
export function resolveAdvertisedHost(bindHost: string, advertisedIp?: string): string {
  const preferred = advertisedIp?.trim();
  if (preferred && preferred !== '0.0.0.0') {
    return preferred;
  }
  if (bindHost && bindHost !== '0.0.0.0' && bindHost !== '::') {
    return bindHost;
  }
  return defaultLocalIp() || '127.0.0.1';
}
