import { UpdateOrchestrator } from '../src/services/UpdateOrchestrator';
import { SimulatedDevice } from '../src/services/SimulatedDevice';
import { DeviceClient } from '../src/services/DeviceClient';
import { DeviceConfig, SimulationSettings } from '../src/types/Device';
import { FirmwareInfo, ReleaseInfo, ReleaseLookup } from '../src/types/Firmware';
import { FakeClock } from './helpers/fakeClock';

const RELEASE: ReleaseInfo = {
  version: '12.4.0',
  releaseDate: '2024-02-14',
  releaseNotes: '',
  downloadUrl: 'https://example.com/tasmota.bin',
  releaseUrl: 'https://example.com/releases/latest',
};
const LOOKUP: ReleaseLookup = { ok: true, release: RELEASE };

function simulated(version: string, simulation: SimulationSettings = {}, extra: Partial<DeviceConfig> = {}): SimulatedDevice {
  return new SimulatedDevice({
    ip: '10.99.0.1',
    simulated: true,
    dnsName: 'sim-plug.lan',
    firmwareInfo: { version, coreVersion: '2_7_4_9', sdkVersion: '2.2.2', isMinimal: false },
    simulation,
    ...extra,
  });
}

describe('UpdateOrchestrator', () => {
  let clock: FakeClock;
  let orchestrator: UpdateOrchestrator;

  beforeEach(() => {
    clock = new FakeClock();
    orchestrator = new UpdateOrchestrator({
      clock,
      pollIntervalMs: 5000,
      pingTimeoutMs: 2000,
      defaultTimeoutSeconds: 60,
      reverseLookup: async () => [],
    });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('checks', () => {
    test('reports up to date without sending a command', async () => {
      const device = simulated('12.4.0');

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('up_to_date');
      expect(outcome.needsUpdate).toBe(false);
      expect(outcome.updateStarted).toBe(false);
      expect(outcome.message).toBe('Device is already running the latest version');
      expect(outcome.states).toEqual(['IDLE', 'PROBED', 'UP_TO_DATE', 'DONE']);
      expect(outcome.dnsName).toBe('sim-plug.lan');
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('treats a newer installed version as up to date', async () => {
      const device = simulated('13.0.0');

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.status).toBe('up_to_date');
      expect(outcome.message).toBe('Device is running 13.0.0, newer than the latest release 12.4.0');
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('reports an available update in check-only mode', async () => {
      const device = simulated('12.3.1');

      const outcome = await orchestrator.reconcile(device, LOOKUP, { checkOnly: true });

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('update_available');
      expect(outcome.needsUpdate).toBe(true);
      expect(outcome.updateStarted).toBe(false);
      expect(outcome.message).toBe('Update available: 12.3.1 -> 12.4.0');
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('check-only runs are repeatable and ignore force', async () => {
      const device = simulated('12.3.1');

      const first = await orchestrator.reconcile(device, LOOKUP, { checkOnly: true, forceUpdate: true });
      const second = await orchestrator.reconcile(device, LOOKUP, { checkOnly: true, forceUpdate: true });

      expect(second.status).toBe(first.status);
      expect(second.currentVersion).toBe(first.currentVersion);
      expect(second.message).toBe(first.message);
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('leaves incomparable versions undetermined', async () => {
      const device = simulated('custom-build');

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe('undetermined');
      expect(outcome.errorKind).toBe('ComparisonIncomparable');
      expect(outcome.needsUpdate).toBe(false);
      expect(outcome.message).toBe(
        "Cannot determine whether an update is needed: version 'custom-build' cannot be compared with '12.4.0'",
      );
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('reports probe failures with their kind', async () => {
      const device = simulated('12.3.1', { probeError: 'AuthFailed' });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe('check_failed');
      expect(outcome.errorKind).toBe('AuthFailed');
      expect(outcome.currentVersion).toBe('Unknown');
      expect(outcome.message).toBe('Failed to get current firmware version (AuthFailed): simulated AuthFailed failure');
      expect(outcome.states).toEqual(['IDLE', 'DONE']);
    });

    test('reports an unavailable release after probing', async () => {
      const device = simulated('12.3.1');

      const outcome = await orchestrator.reconcile(device, { ok: false, error: 'Release source answered HTTP 403' });

      expect(outcome.status).toBe('check_failed');
      expect(outcome.errorKind).toBe('ReleaseUnavailable');
      expect(outcome.currentVersion).toBe('12.3.1');
      expect(outcome.latestVersion).toBe('Unknown');
      expect(outcome.message).toBe('Cannot determine latest version: Release source answered HTTP 403');
      expect(device.getUpgradeCommandCount()).toBe(0);
    });
  });

  describe('updates', () => {
    test('updates an old device that restarts once', async () => {
      const device = simulated('9.5.0', { offlinePolls: 1 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('updated');
      expect(outcome.needsUpdate).toBe(true);
      expect(outcome.updateStarted).toBe(true);
      expect(outcome.updateCompleted).toBe(true);
      expect(outcome.previousVersion).toBe('9.5.0');
      expect(outcome.currentVersion).toBe('12.4.0');
      expect(outcome.message).toBe('Update successful: 9.5.0 -> 12.4.0');
      expect(outcome.timeoutSeconds).toBe(60);
      expect(outcome.states).toEqual([
        'IDLE', 'PROBED', 'NEEDS_UPDATE', 'UPDATE_SENT', 'WAITING_FOR_RECOVERY', 'RECOVERED', 'DONE',
      ]);
      expect(outcome.elapsedMs).toBe(10000);
      expect(device.getUpgradeCommandCount()).toBe(1);
      expect(device.getPingCount()).toBe(2);
    });

    test('notes when no restart was observed', async () => {
      const device = simulated('12.3.1', { offlinePolls: 0 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(true);
      expect(outcome.message).toBe('Update successful: 12.3.1 -> 12.4.0 (no restart observed)');
    });

    test('sends no command in dry-run mode', async () => {
      const device = simulated('12.3.1');

      const outcome = await orchestrator.reconcile(device, LOOKUP, { dryRun: true });

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('dry_run');
      expect(outcome.updateStarted).toBe(false);
      expect(outcome.message).toBe('Dry run: would update from 12.3.1 to 12.4.0; no command sent');
      expect(device.getUpgradeCommandCount()).toBe(0);
    });

    test('force updates a device already on the latest version', async () => {
      const device = simulated('12.4.0', { offlinePolls: 1 });

      const outcome = await orchestrator.reconcile(device, LOOKUP, { forceUpdate: true });

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('updated');
      expect(outcome.needsUpdate).toBe(true);
      expect(device.getUpgradeCommandCount()).toBe(1);
    });

    test('force with dry run is labelled as forced', async () => {
      const device = simulated('custom-build');

      const outcome = await orchestrator.reconcile(device, LOOKUP, { forceUpdate: true, dryRun: true });

      expect(outcome.status).toBe('dry_run');
      expect(outcome.message).toBe('Dry run: would update from custom-build to 12.4.0 (forced); no command sent');
    });

    test('reports a rejected upgrade command', async () => {
      const device = simulated('12.3.1', { failUpgrade: true });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe('update_failed');
      expect(outcome.errorKind).toBe('UpdateCommandFailed');
      expect(outcome.updateStarted).toBe(true);
      expect(outcome.updateCompleted).toBe(false);
      expect(outcome.message).toBe('Update command failed: failed to send upgrade command, status code 500');
      expect(device.getUpgradeCommandCount()).toBe(1);
      expect(device.getPingCount()).toBe(0);
    });

    test('times out when the device never comes back', async () => {
      const device = simulated('12.3.1', { neverRecover: true }, { timeout: 10 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe('recovery_timeout');
      expect(outcome.errorKind).toBe('RecoveryTimeout');
      expect(outcome.updateStarted).toBe(true);
      expect(outcome.updateCompleted).toBe(false);
      expect(outcome.timeoutSeconds).toBe(10);
      expect(outcome.message).toBe(
        'Update initiated but device did not come back online within 10 seconds; it may still be completing the update',
      );
      expect(outcome.states).toEqual([
        'IDLE', 'PROBED', 'NEEDS_UPDATE', 'UPDATE_SENT', 'WAITING_FOR_RECOVERY', 'TIMED_OUT', 'DONE',
      ]);
      expect(outcome.elapsedMs).toBeLessThanOrEqual(10000 + 5000);
      expect(device.getUpgradeCommandCount()).toBe(1);
    });

    test('per-device timeout overrides the run option', async () => {
      const device = simulated('12.3.1', { neverRecover: true }, { timeout: 7 });

      const outcome = await orchestrator.reconcile(device, LOOKUP, { timeout: 120 });

      expect(outcome.timeoutSeconds).toBe(7);
      expect(outcome.elapsedMs).toBe(7000);
    });

    test('run option timeout applies without a device timeout', async () => {
      const device = simulated('12.3.1', { neverRecover: true });

      const outcome = await orchestrator.reconcile(device, LOOKUP, { timeout: 12 });

      expect(outcome.timeoutSeconds).toBe(12);
      expect(clock.sleeps).toEqual([5000, 5000, 2000]);
      expect(device.getPingCount()).toBe(3);
    });

    test('pings once when the timeout equals the poll interval', async () => {
      const device = simulated('12.3.1', { offlinePolls: 0 }, { timeout: 5 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.status).toBe('updated');
      expect(outcome.currentVersion).toBe('12.4.0');
      expect(clock.sleeps).toEqual([5000]);
      expect(device.getPingCount()).toBe(1);
    });

    test('pings once when the timeout is shorter than the poll interval', async () => {
      const device = simulated('12.3.1', { offlinePolls: 0 }, { timeout: 2 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.status).toBe('updated');
      expect(clock.sleeps).toEqual([2000]);
      expect(outcome.elapsedMs).toBe(2000);
    });

    test('accepts a device that answers on the last poll of the window', async () => {
      const device = simulated('12.3.1', { offlinePolls: 11 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(true);
      expect(outcome.status).toBe('updated');
      expect(device.getPingCount()).toBe(12);
      expect(outcome.elapsedMs).toBe(60000);
    });

    test('times out after the ping at the deadline fails', async () => {
      const device = simulated('12.3.1', { offlinePolls: 12 });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.status).toBe('recovery_timeout');
      expect(device.getPingCount()).toBe(12);
      expect(outcome.elapsedMs).toBe(60000);
    });

    test('fails when the device comes back on the old version', async () => {
      const device = simulated('9.5.0', { offlinePolls: 1, keepVersion: true });

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(false);
      expect(outcome.status).toBe('update_failed');
      expect(outcome.errorKind).toBe('VersionUnchanged');
      expect(outcome.updateCompleted).toBe(false);
      expect(outcome.message).toBe('Device came back online but still reports version 9.5.0; the update did not apply');
    });

    test('counts an unconfirmed version as success', async () => {
      let probes = 0;
      const firmware: FirmwareInfo = { version: '12.3.1', coreVersion: '2_7_4_9', sdkVersion: '2.2.2', isMinimal: false };
      const device: DeviceClient = {
        config: { ip: '192.168.1.30', simulated: false },
        probe: async () => {
          probes++;
          if (probes > 1) throw new Error('device returned invalid JSON');
          return firmware;
        },
        sendUpgradeCommand: jest.fn(async () => undefined),
        ping: jest.fn(async () => true),
      };

      const outcome = await orchestrator.reconcile(device, LOOKUP);

      expect(outcome.success).toBe(true);
      expect(outcome.updateCompleted).toBe(true);
      expect(outcome.currentVersion).toBe('12.3.1');
      expect(outcome.dnsName).toBeNull();
      expect(outcome.message).toBe(
        'Update successful; device is back online but the new version could not be confirmed (device returned invalid JSON)',
      );
    });
  });

  test('resolves DNS names of real devices through the reverse lookup', async () => {
    const lookup = jest.fn(async (_ip: string) => ['kitchen-plug.lan']);
    const withDns = new UpdateOrchestrator({ clock, reverseLookup: lookup });
    const device: DeviceClient = {
      config: { ip: '192.168.1.31', simulated: false },
      probe: async () => ({ version: '12.4.0', coreVersion: 'Unknown', sdkVersion: 'Unknown', isMinimal: false }),
      sendUpgradeCommand: async () => undefined,
      ping: async () => true,
    };

    const outcome = await withDns.reconcile(device, LOOKUP);

    expect(lookup).toHaveBeenCalledWith('192.168.1.31');
    expect(outcome.dnsName).toBe('kitchen-plug.lan');
  });
});
