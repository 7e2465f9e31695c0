import { isIP } from 'net';

const HOSTNAME_LABEL_REGEX = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;
const MAX_TIMEOUT_SECONDS = 3600;

function isReservedIpv4(ip: string): boolean {
  const [a, b] = ip.split('.').map(part => parseInt(part, 10));
  if (a === 0 || a === 127) return true; // unspecified, loopback
  if (a === 169 && b === 254) return true; // link-local
  if (a >= 224) return true; // multicast, reserved, broadcast
  return false;
}

function isReservedIpv6(ip: string): boolean {
  const lower = ip.toLowerCase();
  if (lower === '::' || lower === '::1') return true;
  if (lower.startsWith('ff')) return true; // multicast
  return /^fe[89ab]/.test(lower); // link-local fe80::/10
}

/**
 * Accepts IPv4/IPv6 literals outside loopback, multicast, link-local and
 * reserved ranges. Private ranges are fine: devices live on the LAN.
 */
export function isValidIpAddress(ip: string): boolean {
  const family = isIP(ip);
  if (family === 4) return !isReservedIpv4(ip);
  if (family === 6) return !isReservedIpv6(ip);
  return false;
}

export function isValidHostname(host: string): boolean {
  if (!host || host.length > 253) return false;
  if (/^[0-9.]+$/.test(host)) return false; // looks like a malformed IPv4
  const trimmed = host.endsWith('.') ? host.slice(0, -1) : host;
  return trimmed.split('.').every(label => HOSTNAME_LABEL_REGEX.test(label));
}

export function isValidDeviceAddress(address: string, simulated: boolean = false): boolean {
  if (typeof address !== 'string' || address.length === 0) return false;
  if (isIP(address) !== 0) {
    return simulated || isValidIpAddress(address);
  }
  return isValidHostname(address);
}

export function isValidPort(port: unknown): port is number {
  return typeof port === 'number' && Number.isInteger(port) && port > 0 && port <= 65535;
}

export function isValidTimeout(seconds: unknown): seconds is number {
  return typeof seconds === 'number'
    && Number.isInteger(seconds)
    && seconds > 0
    && seconds <= MAX_TIMEOUT_SECONDS;
}
