import { formatDuration, sanitizeError } from '@hub-sync/utils';
import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { Config } from '../config';
import { SYNC_INTERVAL_NAME } from '../constants/defaults.constants';
import { GroupSyncService } from '../synchronization/group-sync.service';

@Injectable()
export class SyncScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private isShuttingDown = false;
  private isRunning = false;

  public constructor(
    private readonly groupSync: GroupSyncService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  public onModuleInit(): void {
    // an interval only fires after its first period, so kick off a cycle right away
    this.logger.log('Triggering initial sync on service startup');
    void this.runSyncCycle();
    this.registerInterval();
  }

  public onModuleDestroy(): void {
    this.logger.log('Shutting down sync scheduler');
    this.isShuttingDown = true;
    if (this.schedulerRegistry.doesExist('interval', SYNC_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SYNC_INTERVAL_NAME);
    }
  }

  public get running(): boolean {
    return this.isRunning;
  }

  /**
   * Runs one cycle unless one is already running. Resolves to whether a cycle ran; a failed
   * cycle is logged and counts as run.
   */
  public async runSyncCycle(): Promise<boolean> {
    if (this.isShuttingDown) {
      this.logger.log('Skipping sync due to shutdown');
      return false;
    }

    if (this.isRunning) {
      this.logger.warn('Sync already in progress, skipping');
      return false;
    }

    this.isRunning = true;
    try {
      const result = await this.groupSync.synchronize();
      this.logger.log(`Sync cycle ${result.status} in ${formatDuration(result.durationMs)}`);
    } catch (error) {
      this.logger.error({ msg: 'Sync cycle failed', error: sanitizeError(error) });
    } finally {
      this.isRunning = false;
    }
    return true;
  }

  private registerInterval(): void {
    const intervalSeconds = this.configService.get('sync.intervalSeconds', { infer: true });
    const interval = setInterval(() => {
      void this.runSyncCycle();
    }, intervalSeconds * 1000);
    this.schedulerRegistry.addInterval(SYNC_INTERVAL_NAME, interval);
    this.logger.log(`Scheduled sync every ${intervalSeconds}s`);
  }
}
