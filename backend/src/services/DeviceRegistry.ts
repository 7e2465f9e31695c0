import { readFileSync } from 'fs';
import { DeviceModel, toDeviceConfig } from '../models/Device';
import { DeviceConfig } from '../types/Device';
import { parseDeviceInput } from '../utils/deviceInput';
import { isRecord, isErrorLike } from '../utils/json';
import { maskPassword } from '../utils/sanitize';

export interface DeviceRegistrationResult {
  success: boolean;
  device?: DeviceConfig;
  error?: string;
  duplicate?: boolean;
}

export interface DeviceImportResult {
  imported: number;
  skipped: number;
  errors: string[];
}

/** Device as shown to API clients: never carries the password. */
export interface DeviceListing {
  ip: string;
  dns_name: string | null;
  port: number | null;
  username: string | null;
  password: string | null;
  timeout: number | null;
  simulated: boolean;
}

export function toDeviceListing(device: DeviceConfig): DeviceListing {
  return {
    ip: device.ip,
    dns_name: device.dnsName ?? null,
    port: device.port ?? null,
    username: device.credentials?.username ?? null,
    password: maskPassword(device.credentials?.password),
    timeout: device.timeout ?? null,
    simulated: device.simulated,
  };
}

export class DeviceRegistry {
  private model: DeviceModel;

  constructor(model: DeviceModel) {
    this.model = model;
  }

  register(raw: unknown): DeviceRegistrationResult {
    const parsed = parseDeviceInput(raw);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }
    if (this.model.getByIp(parsed.device.ip)) {
      return { success: false, duplicate: true, error: `Device ${parsed.device.ip} is already registered` };
    }

    const record = this.model.register(parsed.device);
    return { success: true, device: toDeviceConfig(record) };
  }

  getDevice(ip: string): DeviceConfig | undefined {
    const record = this.model.getByIp(ip);
    return record ? toDeviceConfig(record) : undefined;
  }

  getAllDevices(): DeviceConfig[] {
    return this.model.getAll().map(toDeviceConfig);
  }

  removeDevice(ip: string): boolean {
    return this.model.delete(ip);
  }

  count(): number {
    return this.model.count();
  }

  /**
   * Imports `{ "devices": [...] }` from a JSON file. Invalid entries and
   * addresses already registered are skipped, not fatal.
   */
  importFromFile(path: string): DeviceImportResult {
    const result: DeviceImportResult = { imported: 0, skipped: 0, errors: [] };

    let content: unknown;
    try {
      content = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const message = isErrorLike(err) ? err.message : String(err);
      console.error(`DeviceRegistry: cannot read devices file ${path}: ${message}`);
      result.errors.push(`Cannot read devices file: ${message}`);
      return result;
    }

    if (!isRecord(content) || !Array.isArray(content.devices)) {
      console.error(`DeviceRegistry: invalid devices file format: ${path}`);
      result.errors.push("Devices file must contain a 'devices' list");
      return result;
    }

    content.devices.forEach((entry: unknown, i: number) => {
      const registration = this.register(entry);
      if (registration.success) {
        result.imported++;
      } else {
        result.skipped++;
        const error = `Device #${i + 1}: ${registration.error}`;
        result.errors.push(error);
        console.warn(`DeviceRegistry: skipping ${error}`);
      }
    });

    console.log(`DeviceRegistry: loaded ${result.imported} device(s) from ${path}`);
    return result;
  }
}
