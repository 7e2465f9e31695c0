import * as cron from 'node-cron';
import { DeviceRegistry } from './DeviceRegistry';
import { UpdateService } from './UpdateService';
import { FleetSummary } from '../types/Update';
import { SCHEDULER_CONFIG } from '../config';

export class Scheduler {
  private updateService: UpdateService;
  private registry: DeviceRegistry;
  private expression: string;
  private tasks: cron.ScheduledTask[] = [];
  private running: boolean = false;

  constructor(updateService: UpdateService, registry: DeviceRegistry, expression: string = SCHEDULER_CONFIG.checkSchedule) {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: ${expression}`);
    }
    this.updateService = updateService;
    this.registry = registry;
    this.expression = expression;
  }

  start(): void {
    const checkJob = cron.schedule(this.expression, () => {
      void this.runScheduledCheck();
    });
    this.tasks.push(checkJob);
    console.log(`Scheduler: fleet firmware check registered (${this.expression})`);
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Check-only pass over the fleet; resolves to undefined when skipped or failed. */
  async runScheduledCheck(): Promise<FleetSummary | undefined> {
    if (this.running) {
      console.warn('Scheduler: previous fleet check still running, skipping');
      return undefined;
    }
    if (this.registry.count() === 0) {
      console.log('Scheduler: no devices configured, skipping fleet check');
      return undefined;
    }

    this.running = true;
    try {
      return await this.updateService.runFleet({ checkOnly: true }, 'scheduled');
    } catch (err) {
      console.error('Scheduler: fleet check failed:', err);
      return undefined;
    } finally {
      this.running = false;
    }
  }
}
