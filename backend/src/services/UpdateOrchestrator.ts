import { FirmwareInfo, ReleaseLookup } from '../types/Firmware';
import { OrchestratorState, ReconcileOptions, UpdateOutcome } from '../types/Update';
import { DEVICE_CONFIG } from '../config';
import { DeviceClient } from './DeviceClient';
import { ProbeError } from './DeviceErrors';
import { Clock, systemClock } from '../utils/clock';
import { ReverseLookup, resolveDnsName } from '../utils/dns';
import { compareVersions } from '../utils/version';
import { sanitizeLogData } from '../utils/sanitize';
import { isErrorLike } from '../utils/json';

export interface UpdateOrchestratorOptions {
  clock?: Clock;
  pollIntervalMs?: number;
  pingTimeoutMs?: number;
  defaultTimeoutSeconds?: number;
  reverseLookup?: ReverseLookup;
}

interface RecoveryResult {
  recovered: boolean;
  sawOffline: boolean;
}

function errorMessage(err: unknown): string {
  return sanitizeLogData(isErrorLike(err) ? err.message : err);
}

/**
 * Drives one device from probe to a terminal outcome:
 * IDLE → PROBED → UP_TO_DATE | NEEDS_UPDATE → UPDATE_SENT →
 * WAITING_FOR_RECOVERY → RECOVERED | TIMED_OUT → DONE.
 *
 * Never throws; every failure becomes an UpdateOutcome.
 */
export class UpdateOrchestrator {
  private clock: Clock;
  private pollIntervalMs: number;
  private pingTimeoutMs: number;
  private defaultTimeoutSeconds: number;
  private reverseLookup?: ReverseLookup;

  constructor(options: UpdateOrchestratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? DEVICE_CONFIG.pollIntervalMs;
    this.pingTimeoutMs = options.pingTimeoutMs ?? DEVICE_CONFIG.pingTimeoutMs;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEVICE_CONFIG.recoveryTimeoutSeconds;
    this.reverseLookup = options.reverseLookup;
  }

  async reconcile(device: DeviceClient, release: ReleaseLookup, options: ReconcileOptions = {}): Promise<UpdateOutcome> {
    const startedAt = this.clock.now();
    const ip = device.config.ip;
    const states: OrchestratorState[] = ['IDLE'];
    const checkOnly = options.checkOnly === true;
    const forceUpdate = options.forceUpdate === true && !checkOnly;

    const draft: UpdateOutcome = {
      ip,
      dnsName: await resolveDnsName(device.config, this.reverseLookup),
      success: false,
      status: 'check_failed',
      message: '',
      currentVersion: 'Unknown',
      previousVersion: 'Unknown',
      latestVersion: release.ok ? release.release.version : 'Unknown',
      needsUpdate: false,
      updateStarted: false,
      updateCompleted: false,
      isMinimal: false,
      states,
      elapsedMs: 0,
    };

    const finish = (patch: Partial<UpdateOutcome>): UpdateOutcome => {
      states.push('DONE');
      const outcome: UpdateOutcome = {
        ...draft,
        ...patch,
        states: [...states],
        elapsedMs: this.clock.now() - startedAt,
      };
      const log = outcome.success ? console.log : console.warn;
      log(`UpdateOrchestrator: ${ip}: ${outcome.status}: ${outcome.message}`);
      return outcome;
    };

    // 1. Probe
    let firmware: FirmwareInfo;
    try {
      firmware = await device.probe();
    } catch (err) {
      const kind = err instanceof ProbeError ? err.kind : 'Unreachable';
      return finish({
        status: 'check_failed',
        errorKind: kind,
        message: `Failed to get current firmware version (${kind}): ${errorMessage(err)}`,
      });
    }
    states.push('PROBED');
    draft.currentVersion = firmware.version;
    draft.previousVersion = firmware.version;
    draft.isMinimal = firmware.isMinimal;

    // 2. Release
    if (!release.ok) {
      return finish({
        status: 'check_failed',
        errorKind: 'ReleaseUnavailable',
        message: `Cannot determine latest version: ${release.error}`,
      });
    }
    const latest = release.release;

    // 3. Compare
    const comparison = compareVersions(firmware.version, latest.version);
    if (comparison === 'incomparable' && !forceUpdate) {
      return finish({
        status: 'undetermined',
        errorKind: 'ComparisonIncomparable',
        message: `Cannot determine whether an update is needed: version '${firmware.version}' cannot be compared with '${latest.version}'`,
      });
    }
    if ((comparison === 'same' || comparison === 'newer') && !forceUpdate) {
      states.push('UP_TO_DATE');
      return finish({
        success: true,
        status: 'up_to_date',
        message: comparison === 'same'
          ? 'Device is already running the latest version'
          : `Device is running ${firmware.version}, newer than the latest release ${latest.version}`,
      });
    }
    states.push('NEEDS_UPDATE');
    draft.needsUpdate = true;

    // 4. Check only
    if (checkOnly) {
      return finish({
        success: true,
        status: 'update_available',
        message: `Update available: ${firmware.version} -> ${latest.version}`,
      });
    }

    // 5. Dry run
    if (options.dryRun) {
      return finish({
        success: true,
        status: 'dry_run',
        message: `Dry run: would update from ${firmware.version} to ${latest.version}${forceUpdate ? ' (forced)' : ''}; no command sent`,
      });
    }

    // 6. Upgrade command, sent at most once
    states.push('UPDATE_SENT');
    draft.updateStarted = true;
    try {
      await device.sendUpgradeCommand(latest);
    } catch (err) {
      return finish({
        status: 'update_failed',
        errorKind: 'UpdateCommandFailed',
        message: `Update command failed: ${errorMessage(err)}`,
      });
    }

    // 7. Wait for the device to come back
    const timeoutSeconds = device.config.timeout ?? options.timeout ?? this.defaultTimeoutSeconds;
    draft.timeoutSeconds = timeoutSeconds;
    states.push('WAITING_FOR_RECOVERY');
    console.log(`UpdateOrchestrator: ${ip}: waiting up to ${timeoutSeconds}s for device to come back online`);
    const recovery = await this.waitForRecovery(device, timeoutSeconds * 1000);

    if (!recovery.recovered) {
      states.push('TIMED_OUT');
      return finish({
        status: 'recovery_timeout',
        errorKind: 'RecoveryTimeout',
        message: `Update initiated but device did not come back online within ${timeoutSeconds} seconds; it may still be completing the update`,
      });
    }
    states.push('RECOVERED');

    // 8. Verify the new version
    let updated: FirmwareInfo;
    try {
      updated = await device.probe();
    } catch (err) {
      return finish({
        success: true,
        updateCompleted: true,
        status: 'updated',
        message: `Update successful; device is back online but the new version could not be confirmed (${errorMessage(err)})`,
      });
    }

    const after = compareVersions(updated.version, latest.version);
    if (comparison === 'older' && after === 'older' && updated.version === firmware.version) {
      return finish({
        status: 'update_failed',
        errorKind: 'VersionUnchanged',
        message: `Device came back online but still reports version ${updated.version}; the update did not apply`,
      });
    }

    const observed = recovery.sawOffline ? '' : ' (no restart observed)';
    return finish({
      success: true,
      updateCompleted: true,
      status: 'updated',
      currentVersion: updated.version,
      isMinimal: updated.isMinimal,
      message: `Update successful: ${firmware.version} -> ${updated.version}${observed}`,
    });
  }

  /**
   * Polls until the device answers or the deadline passes. Every sleep is
   * followed by a ping, including the one that lands on the deadline, so the
   * window can overrun by at most one ping timeout.
   */
  private async waitForRecovery(device: DeviceClient, timeoutMs: number): Promise<RecoveryResult> {
    const deadline = this.clock.now() + timeoutMs;
    let sawOffline = false;

    while (this.clock.now() < deadline) {
      await this.clock.sleep(Math.min(this.pollIntervalMs, deadline - this.clock.now()));

      if (await device.ping(this.pingTimeoutMs)) {
        return { recovered: true, sawOffline };
      }
      sawOffline = true;
    }

    return { recovered: false, sawOffline };
  }
}
