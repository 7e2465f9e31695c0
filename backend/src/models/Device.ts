import Database from 'better-sqlite3';
import { DeviceConfig } from '../types/Device';
import { parseFirmwareInfo, parseSimulationSettings } from '../utils/deviceInput';

export interface DeviceRecord {
  ip: string;
  dns_name: string | null;
  port: number | null;
  username: string | null;
  password: string | null;
  timeout: number | null;
  simulated: number;
  firmware_info: string | null; // JSON string
  simulation: string | null; // JSON string
  created_at: string;
}

function parseJson(text: string | null): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function toDeviceConfig(record: DeviceRecord): DeviceConfig {
  const device: DeviceConfig = { ip: record.ip, simulated: record.simulated === 1 };
  if (record.dns_name) device.dnsName = record.dns_name;
  if (record.port !== null) device.port = record.port;
  if (record.username && record.password) {
    device.credentials = { username: record.username, password: record.password };
  }
  if (record.timeout !== null) device.timeout = record.timeout;

  const firmwareInfo = parseFirmwareInfo(parseJson(record.firmware_info));
  if (firmwareInfo) device.firmwareInfo = firmwareInfo;
  const simulation = parseSimulationSettings(parseJson(record.simulation));
  if (simulation) device.simulation = simulation;
  return device;
}

export class DeviceModel {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  register(device: DeviceConfig): DeviceRecord {
    const stmt = this.db.prepare(`
      INSERT INTO devices (ip, dns_name, port, username, password, timeout, simulated, firmware_info, simulation)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const firmware = device.firmwareInfo;
    const simulation = device.simulation;
    stmt.run(
      device.ip,
      device.dnsName || null,
      device.port ?? null,
      device.credentials?.username || null,
      device.credentials?.password || null,
      device.timeout ?? null,
      device.simulated ? 1 : 0,
      firmware
        ? JSON.stringify({
          version: firmware.version,
          core_version: firmware.coreVersion,
          sdk_version: firmware.sdkVersion,
          is_minimal: firmware.isMinimal,
        })
        : null,
      simulation
        ? JSON.stringify({
          offline_polls: simulation.offlinePolls,
          never_recover: simulation.neverRecover,
          fail_upgrade: simulation.failUpgrade,
          probe_error: simulation.probeError,
          updated_version: simulation.updatedVersion,
          keep_version: simulation.keepVersion,
        })
        : null,
    );

    return this.getByIp(device.ip)!;
  }

  getByIp(ip: string): DeviceRecord | undefined {
    const stmt = this.db.prepare('SELECT * FROM devices WHERE ip = ?');
    return stmt.get(ip) as DeviceRecord | undefined;
  }

  getAll(): DeviceRecord[] {
    const stmt = this.db.prepare('SELECT * FROM devices ORDER BY created_at ASC, rowid ASC');
    return stmt.all() as DeviceRecord[];
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as cnt FROM devices').get() as { cnt: number } | undefined;
    return row?.cnt || 0;
  }

  delete(ip: string): boolean {
    const stmt = this.db.prepare('DELETE FROM devices WHERE ip = ?');
    const result = stmt.run(ip);
    return result.changes > 0;
  }
}
