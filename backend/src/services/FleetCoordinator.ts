import { v4 as uuidv4 } from 'uuid';
import { DeviceConfig } from '../types/Device';
import { ReleaseLookup } from '../types/Firmware';
import { FleetSummary, ReconcileOptions, UpdateOutcome } from '../types/Update';
import { FLEET_CONFIG } from '../config';
import { DeviceClientFactory, createDeviceClient } from './DeviceClient';
import { UpdateOrchestrator } from './UpdateOrchestrator';
import { sanitizeLogData } from '../utils/sanitize';
import { isErrorLike } from '../utils/json';

export class FleetConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FleetConfigurationError';
  }
}

export interface ReleaseSource {
  getLatestRelease(options?: { refresh?: boolean }): Promise<ReleaseLookup>;
}

export interface FleetCoordinatorOptions {
  concurrency?: number;
  createClient?: DeviceClientFactory;
}

export type OutcomeListener = (outcome: UpdateOutcome, index: number) => void;

export class FleetCoordinator {
  private releases: ReleaseSource;
  private orchestrator: UpdateOrchestrator;
  private concurrency: number;
  private createClient: DeviceClientFactory;

  constructor(releases: ReleaseSource, orchestrator: UpdateOrchestrator, options: FleetCoordinatorOptions = {}) {
    this.releases = releases;
    this.orchestrator = orchestrator;
    const requested = options.concurrency ?? FLEET_CONFIG.concurrency;
    this.concurrency = Math.max(1, Math.min(FLEET_CONFIG.maxConcurrency, Math.floor(requested)));
    this.createClient = options.createClient ?? createDeviceClient;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  /**
   * Reconciles every device against one shared release lookup. Outcomes are
   * returned in input order whatever order the devices finish in.
   */
  async run(devices: DeviceConfig[], options: ReconcileOptions = {}, onOutcome?: OutcomeListener): Promise<FleetSummary> {
    if (devices.length === 0) {
      throw new FleetConfigurationError('No devices configured');
    }

    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const release = await this.releases.getLatestRelease();
    if (!release.ok) {
      console.warn(`FleetCoordinator: latest release unavailable for run ${runId}: ${release.error}`);
    }

    const outcomes: UpdateOutcome[] = new Array(devices.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < devices.length) {
        const index = next++;
        const outcome = await this.reconcileIsolated(devices[index], release, options);
        outcomes[index] = outcome;
        this.notify(onOutcome, outcome, index);
      }
    };

    const workerCount = Math.min(this.concurrency, devices.length);
    console.log(`FleetCoordinator: run ${runId} started for ${devices.length} device(s), ${workerCount} at a time`);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const summary: FleetSummary = {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      latestVersion: release.ok ? release.release.version : 'Unknown',
      options: { ...options },
      total: outcomes.length,
      checked: outcomes.filter(o => o.states.includes('PROBED')).length,
      needsUpdate: outcomes.filter(o => o.needsUpdate).length,
      updated: outcomes.filter(o => o.success && o.updateCompleted).length,
      success: outcomes.filter(o => o.success).length,
      failed: outcomes.filter(o => !o.success).length,
      outcomes,
    };

    console.log(
      `FleetCoordinator: run ${runId} finished: ${summary.success}/${summary.total} succeeded, ` +
      `${summary.needsUpdate} needed an update, ${summary.updated} updated`,
    );
    return summary;
  }

  private async reconcileIsolated(config: DeviceConfig, release: ReleaseLookup, options: ReconcileOptions): Promise<UpdateOutcome> {
    try {
      return await this.orchestrator.reconcile(this.createClient(config), release, options);
    } catch (err) {
      const message = sanitizeLogData(isErrorLike(err) ? err.message : err);
      console.error(`FleetCoordinator: ${config.ip}: unexpected error: ${message}`);
      return {
        ip: config.ip,
        dnsName: config.dnsName ?? null,
        success: false,
        status: 'check_failed',
        message: `Unexpected error while checking device: ${message}`,
        currentVersion: 'Unknown',
        previousVersion: 'Unknown',
        latestVersion: release.ok ? release.release.version : 'Unknown',
        needsUpdate: false,
        updateStarted: false,
        updateCompleted: false,
        isMinimal: false,
        states: ['IDLE', 'DONE'],
        elapsedMs: 0,
      };
    }
  }

  private notify(listener: OutcomeListener | undefined, outcome: UpdateOutcome, index: number): void {
    if (!listener) return;
    try {
      listener(outcome, index);
    } catch (err) {
      console.error(`FleetCoordinator: outcome listener failed:`, err);
    }
  }
}
