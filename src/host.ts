import { networkInterfaces } from 'node:os';

const LOCALHOST = 'localhost';

/** IPv4 addresses assigned to this machine's non-loopback interfaces. */
export function discoverLocalIPv4Addresses(
  interfaces: ReturnType<typeof networkInterfaces> = networkInterfaces()
): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family !== 'IPv4' || entry.internal) continue;
      addresses.push(entry.address);
    }
  }
  return addresses;
}

export function defaultBindAddresses(): string[] {
  return [...new Set([LOCALHOST, ...discoverLocalIPv4Addresses()])];
}

export function formatHostForUrl(hostname: string): string {
  if (hostname.includes(':') && !hostname.startsWith('['))
    return `[${hostname}]`;
  return hostname;
}

function stripIpv4MappedPrefix(address: string): string {
  return address.startsWith('::ffff:') && address.includes('.')
    ? address.slice('::ffff:'.length)
    : address;
}

export function formatEndpoint(
  address: string | undefined,
  port: number | undefined
): string {
  const host = formatHostForUrl(stripIpv4MappedPrefix(address ?? ''));
  return port === undefined ? host : `${host}:${port}`;
}

/** Base URL a redirect target is appended to; a configured public address wins. */
export function resolveRedirectBase(
  publicAddress: string,
  hostAddress: string
): string {
  const authority = publicAddress.length > 0 ? publicAddress : hostAddress;
  return `http://${authority}`;
}
