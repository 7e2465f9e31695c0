import { DeviceConfig, SimulationSettings } from '../types/Device';
import { FirmwareInfo, ReleaseInfo } from '../types/Firmware';
import { DeviceClient } from './DeviceClient';
import { ProbeError, UpgradeCommandError } from './DeviceErrors';
import { isMinimalBuild } from '../utils/version';

const DEFAULT_FIRMWARE: FirmwareInfo = {
  version: '12.0.0',
  coreVersion: '2.7.4.9',
  sdkVersion: '3.0.2',
  isMinimal: false,
};

/**
 * Stands in for a device without touching the network. After an upgrade
 * command it stays offline for `offlinePolls` pings, then reports the new
 * version.
 */
export class SimulatedDevice implements DeviceClient {
  readonly config: DeviceConfig;
  private firmware: FirmwareInfo;
  private settings: SimulationSettings;
  private pendingVersion: string | null = null;
  private remainingOfflinePolls: number = 0;
  private upgradeCommands: number = 0;
  private pings: number = 0;

  constructor(config: DeviceConfig) {
    this.config = config;
    this.settings = config.simulation ?? {};
    if (config.firmwareInfo) {
      this.firmware = { ...config.firmwareInfo };
    } else {
      console.warn(`SimulatedDevice: ${config.ip}: no firmware info configured, using ${DEFAULT_FIRMWARE.version}`);
      this.firmware = { ...DEFAULT_FIRMWARE };
    }
  }

  async probe(): Promise<FirmwareInfo> {
    if (this.settings.probeError) {
      throw new ProbeError(this.settings.probeError, `simulated ${this.settings.probeError} failure`);
    }
    return { ...this.firmware };
  }

  async sendUpgradeCommand(release: ReleaseInfo): Promise<void> {
    this.upgradeCommands++;
    if (this.settings.failUpgrade) {
      throw new UpgradeCommandError('failed to send upgrade command, status code 500');
    }
    this.pendingVersion = this.settings.keepVersion
      ? this.firmware.version
      : this.settings.updatedVersion ?? release.version;
    this.remainingOfflinePolls = this.settings.offlinePolls ?? 1;
    console.log(`SimulatedDevice: ${this.config.ip}: simulating upgrade to ${this.pendingVersion}`);
  }

  async ping(): Promise<boolean> {
    this.pings++;
    if (this.pendingVersion === null) return true;
    if (this.settings.neverRecover) return false;
    if (this.remainingOfflinePolls > 0) {
      this.remainingOfflinePolls--;
      return false;
    }

    this.firmware = {
      ...this.firmware,
      version: this.pendingVersion,
      isMinimal: isMinimalBuild(this.pendingVersion),
    };
    this.pendingVersion = null;
    return true;
  }

  getUpgradeCommandCount(): number {
    return this.upgradeCommands;
  }

  getPingCount(): number {
    return this.pings;
  }
}
