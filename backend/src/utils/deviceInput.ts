import { DeviceConfig, SimulationSettings } from '../types/Device';
import { FirmwareInfo } from '../types/Firmware';
import { ProbeErrorKind } from '../types/Update';
import { isRecord, stringField } from './json';
import { isValidDeviceAddress, isValidPort, isValidTimeout } from './validation';
import { isMinimalBuild } from './version';

const PROBE_ERROR_KINDS: readonly ProbeErrorKind[] = ['Unreachable', 'AuthFailed', 'MalformedResponse', 'ServerError'];

export type DeviceInputResult =
  | { ok: true; device: DeviceConfig }
  | { ok: false; error: string };

function isProbeErrorKind(value: unknown): value is ProbeErrorKind {
  return typeof value === 'string' && PROBE_ERROR_KINDS.some(kind => kind === value);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function parseFirmwareInfo(raw: unknown): FirmwareInfo | undefined {
  if (!isRecord(raw)) return undefined;
  const version = stringField(raw, 'version', 'Unknown');
  return {
    version,
    coreVersion: stringField(raw, 'core_version', 'Unknown'),
    sdkVersion: stringField(raw, 'sdk_version', 'Unknown'),
    isMinimal: typeof raw.is_minimal === 'boolean' ? raw.is_minimal : isMinimalBuild(version),
  };
}

export function parseSimulationSettings(raw: unknown): SimulationSettings | undefined {
  if (!isRecord(raw)) return undefined;
  const settings: SimulationSettings = {};
  if (typeof raw.offline_polls === 'number' && raw.offline_polls >= 0) settings.offlinePolls = Math.floor(raw.offline_polls);
  if (raw.never_recover === true) settings.neverRecover = true;
  if (raw.fail_upgrade === true) settings.failUpgrade = true;
  if (isProbeErrorKind(raw.probe_error)) settings.probeError = raw.probe_error;
  if (typeof raw.updated_version === 'string') settings.updatedVersion = raw.updated_version;
  if (raw.keep_version === true) settings.keepVersion = true;
  return settings;
}

/**
 * Validates one device entry as written in a devices file or an API body:
 * `{ ip, dns_name?, port?, username?, password?, timeout?, simulated?, firmware_info?, simulation? }`.
 * `fake: true` is accepted as an alias of `simulated: true`.
 */
export function parseDeviceInput(raw: unknown): DeviceInputResult {
  if (!isRecord(raw)) {
    return { ok: false, error: 'Device entry must be an object' };
  }

  const ip = typeof raw.ip === 'string' ? raw.ip.trim() : '';
  if (!ip) {
    return { ok: false, error: 'Missing required field: ip' };
  }

  const simulated = raw.simulated === true || raw.fake === true;
  if (!isValidDeviceAddress(ip, simulated)) {
    return { ok: false, error: `Invalid device address: ${ip}` };
  }

  if (raw.timeout !== undefined && raw.timeout !== null && !isValidTimeout(raw.timeout)) {
    return { ok: false, error: 'timeout must be a whole number of seconds between 1 and 3600' };
  }

  if (raw.port !== undefined && raw.port !== null && !isValidPort(raw.port)) {
    return { ok: false, error: 'port must be a whole number between 1 and 65535' };
  }

  const device: DeviceConfig = { ip, simulated };
  const dnsName = optionalString(raw, 'dns_name');
  if (dnsName) device.dnsName = dnsName;

  const username = optionalString(raw, 'username');
  const password = optionalString(raw, 'password');
  if (username && password) {
    device.credentials = { username, password };
  }

  if (isValidPort(raw.port)) device.port = raw.port;
  if (isValidTimeout(raw.timeout)) device.timeout = raw.timeout;

  if (simulated) {
    const firmwareInfo = parseFirmwareInfo(raw.firmware_info);
    if (firmwareInfo) device.firmwareInfo = firmwareInfo;
    const simulation = parseSimulationSettings(raw.simulation);
    if (simulation) device.simulation = simulation;
  }

  return { ok: true, device };
}
