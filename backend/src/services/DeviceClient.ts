import { DeviceConfig } from '../types/Device';
import { FirmwareInfo, ReleaseInfo } from '../types/Firmware';
import { TasmotaDevice } from './TasmotaDevice';
import { SimulatedDevice } from './SimulatedDevice';

/**
 * What the orchestrator needs from a device, real or simulated.
 * `probe` rejects with ProbeError, `sendUpgradeCommand` with UpgradeCommandError.
 */
export interface DeviceClient {
  readonly config: DeviceConfig;
  probe(): Promise<FirmwareInfo>;
  sendUpgradeCommand(release: ReleaseInfo): Promise<void>;
  ping(timeoutMs?: number): Promise<boolean>;
}

export type DeviceClientFactory = (config: DeviceConfig) => DeviceClient;

export const createDeviceClient: DeviceClientFactory = (config) =>
  config.simulated ? new SimulatedDevice(config) : new TasmotaDevice(config);
