import { promises as dns } from 'dns';
import { isIP } from 'net';
import { DEVICE_CONFIG } from '../config';
import { DeviceConfig } from '../types/Device';

export type ReverseLookup = (ip: string) => Promise<string[]>;

/**
 * Best-effort DNS name for a device. Simulated devices report their
 * configured name; hostnames, failed lookups and lookups slower than
 * `timeoutMs` yield null.
 */
export async function resolveDnsName(
  device: DeviceConfig,
  reverse: ReverseLookup = dns.reverse,
  timeoutMs: number = DEVICE_CONFIG.dnsTimeoutMs,
): Promise<string | null> {
  if (device.simulated) {
    return device.dnsName ?? null;
  }
  if (device.dnsName) return device.dnsName;
  if (isIP(device.ip) === 0) return null;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<string[]>(resolve => {
    timer = setTimeout(() => resolve([]), timeoutMs);
  });

  try {
    const names = await Promise.race([reverse(device.ip), expired]);
    const name = names.find(n => n && n !== device.ip);
    return name ?? null;
  } catch {
    return null;
  } finally {
    clearTimeout(timer);
  }
}
