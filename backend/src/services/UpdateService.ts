import { DeviceConfig } from '../types/Device';
import { FleetSummary, ReconcileOptions, UpdateOutcome } from '../types/Update';
import { RunTrigger, UpdateResultRecord, UpdateRunModel, UpdateRunRecord } from '../models/UpdateRun';
import { DeviceRegistry } from './DeviceRegistry';
import { FleetConfigurationError, FleetCoordinator } from './FleetCoordinator';
import { ProgressBroadcaster } from './WebSocketService';

export interface RunDetails {
  run: UpdateRunRecord;
  results: UpdateResultRecord[];
}

/** Runs reconciliations for the API and the scheduler and records them. */
export class UpdateService {
  private registry: DeviceRegistry;
  private coordinator: FleetCoordinator;
  private history: UpdateRunModel;
  private broadcaster?: ProgressBroadcaster;

  constructor(
    registry: DeviceRegistry,
    coordinator: FleetCoordinator,
    history: UpdateRunModel,
    broadcaster?: ProgressBroadcaster,
  ) {
    this.registry = registry;
    this.coordinator = coordinator;
    this.history = history;
    this.broadcaster = broadcaster;
  }

  setBroadcaster(broadcaster: ProgressBroadcaster): void {
    this.broadcaster = broadcaster;
  }

  async runFleet(options: ReconcileOptions, trigger: RunTrigger = 'manual'): Promise<FleetSummary> {
    const devices = this.registry.getAllDevices();
    if (devices.length === 0) {
      throw new FleetConfigurationError('No devices configured');
    }

    this.broadcaster?.broadcastFleetStarted(trigger, devices.length);
    const summary = await this.coordinator.run(devices, options, (outcome, index) => {
      this.broadcaster?.broadcastOutcome(outcome, index);
    });
    this.history.record(summary, trigger);
    this.broadcaster?.broadcastFleetCompleted(summary);
    return summary;
  }

  async updateDevice(device: DeviceConfig, options: ReconcileOptions): Promise<{ runId: string; outcome: UpdateOutcome }> {
    const summary = await this.coordinator.run([device], options);
    this.history.record(summary, 'device');
    return { runId: summary.runId, outcome: summary.outcomes[0] };
  }

  getRecentRuns(limit?: number): UpdateRunRecord[] {
    return this.history.getRecent(limit);
  }

  getRun(id: string): RunDetails | undefined {
    const run = this.history.getById(id);
    if (!run) return undefined;
    return { run, results: this.history.getResults(id) };
  }
}
