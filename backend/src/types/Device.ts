import { FirmwareInfo } from './Firmware';
import { ProbeErrorKind } from './Update';

export interface DeviceCredentials {
  username: string;
  password: string;
}

/** Knobs for simulated devices; ignored for real hardware. */
export interface SimulationSettings {
  // Pings that fail after the upgrade command before the device answers again
  offlinePolls?: number;
  neverRecover?: boolean;
  failUpgrade?: boolean;
  probeError?: ProbeErrorKind;
  // Version reported after a completed upgrade; defaults to the release version
  updatedVersion?: string;
  keepVersion?: boolean;
}

export interface DeviceConfig {
  ip: string;
  dnsName?: string;
  // HTTP port of the web interface; 80 when unset
  port?: number;
  credentials?: DeviceCredentials;
  // Seconds to wait for the device to come back after an upgrade
  timeout?: number;
  simulated: boolean;
  firmwareInfo?: FirmwareInfo;
  simulation?: SimulationSettings;
}
