import { isIP } from 'net';
import { DeviceConfig } from '../types/Device';
import { FirmwareInfo, ReleaseInfo } from '../types/Firmware';
import { DEVICE_CONFIG } from '../config';
import { DeviceClient } from './DeviceClient';
import { ProbeError, UpgradeCommandError } from './DeviceErrors';
import { isRecord, stringField, isErrorLike } from '../utils/json';
import { isMinimalBuild } from '../utils/version';
import { sanitizeLogData } from '../utils/sanitize';

export interface TasmotaDeviceTimeouts {
  statusTimeoutMs?: number;
  pingTimeoutMs?: number;
}

/** A Tasmota device reached over its local HTTP command API. */
export class TasmotaDevice implements DeviceClient {
  readonly config: DeviceConfig;
  private statusTimeoutMs: number;
  private pingTimeoutMs: number;

  constructor(config: DeviceConfig, timeouts: TasmotaDeviceTimeouts = {}) {
    this.config = config;
    this.statusTimeoutMs = timeouts.statusTimeoutMs ?? DEVICE_CONFIG.statusTimeoutMs;
    this.pingTimeoutMs = timeouts.pingTimeoutMs ?? DEVICE_CONFIG.pingTimeoutMs;
  }

  baseUrl(): string {
    const host = isIP(this.config.ip) === 6 ? `[${this.config.ip}]` : this.config.ip;
    const port = this.config.port && this.config.port !== 80 ? `:${this.config.port}` : '';
    return `http://${host}${port}`;
  }

  commandUrl(command: string): string {
    return `${this.baseUrl()}${DEVICE_CONFIG.commandPath}?cmnd=${encodeURIComponent(command)}`;
  }

  async probe(): Promise<FirmwareInfo> {
    const ip = this.config.ip;
    let res: Response;
    try {
      console.debug(`TasmotaDevice: ${ip}: requesting firmware version information`);
      res = await this.request(this.commandUrl(DEVICE_CONFIG.statusCommand), this.statusTimeoutMs);
    } catch (err) {
      throw new ProbeError('Unreachable', `device unreachable: ${describeError(err)}`);
    }

    if (res.status === 401 || res.status === 403) {
      throw new ProbeError('AuthFailed', `device rejected credentials (HTTP ${res.status})`);
    }
    if (res.status >= 500) {
      throw new ProbeError('ServerError', `device answered HTTP ${res.status}`);
    }
    if (!res.ok) {
      throw new ProbeError('MalformedResponse', `unexpected HTTP status ${res.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await res.text());
    } catch {
      throw new ProbeError('MalformedResponse', 'device returned invalid JSON');
    }
    if (!isRecord(payload)) {
      throw new ProbeError('MalformedResponse', 'device returned an unexpected payload');
    }

    // Password-protected devices answer 200 with a warning instead of data
    const warning = payload.WARNING;
    if (typeof warning === 'string' && /need user/i.test(warning)) {
      throw new ProbeError('AuthFailed', 'device requires credentials');
    }

    const fw = payload.StatusFWR;
    if (!isRecord(fw)) {
      throw new ProbeError('MalformedResponse', 'StatusFWR not found in device response');
    }

    const version = stringField(fw, 'Version', 'Unknown');
    const info: FirmwareInfo = {
      version,
      coreVersion: stringField(fw, 'Core', 'Unknown'),
      sdkVersion: stringField(fw, 'SDK', 'Unknown'),
      isMinimal: version !== 'Unknown' && isMinimalBuild(version),
    };
    console.debug(`TasmotaDevice: ${ip}: firmware ${info.version}, core ${info.coreVersion}, SDK ${info.sdkVersion}`);
    return info;
  }

  async sendUpgradeCommand(release: ReleaseInfo): Promise<void> {
    const ip = this.config.ip;
    console.log(`TasmotaDevice: ${ip}: sending upgrade command (target ${release.version})`);
    let res: Response;
    try {
      res = await this.request(this.commandUrl(DEVICE_CONFIG.upgradeCommand), this.statusTimeoutMs);
    } catch (err) {
      throw new UpgradeCommandError(`error connecting to device: ${describeError(err)}`);
    }
    if (!res.ok) {
      throw new UpgradeCommandError(`failed to send upgrade command, status code ${res.status}`);
    }
  }

  async ping(timeoutMs?: number): Promise<boolean> {
    try {
      const res = await this.request(`${this.baseUrl()}/`, timeoutMs ?? this.pingTimeoutMs);
      return res.ok;
    } catch {
      return false;
    }
  }

  private authHeaders(): Record<string, string> {
    const creds = this.config.credentials;
    if (creds && creds.username && creds.password) {
      const token = Buffer.from(`${creds.username}:${creds.password}`).toString('base64');
      return { Authorization: `Basic ${token}` };
    }
    return {};
  }

  private async request(url: string, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetch(url, {
        method: 'GET',
        signal: controller.signal,
        headers: this.authHeaders(),
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

function describeError(err: unknown): string {
  if (isErrorLike(err)) {
    if (err.name === 'AbortError') return 'request timed out';
    const cause = isErrorLike(err.cause) ? `: ${err.cause.message}` : '';
    return sanitizeLogData(`${err.message}${cause}`);
  }
  return sanitizeLogData(err);
}
