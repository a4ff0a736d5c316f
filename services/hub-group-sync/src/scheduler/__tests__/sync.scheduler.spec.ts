import { Logger } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { SYNC_INTERVAL_NAME } from '../../constants/defaults.constants';
import { DirectoryProblemError, TransportError } from '../../errors/sync.errors';
import type { GroupSyncService } from '../../synchronization/group-sync.service';
import type { SyncCycleResult } from '../../synchronization/sync.types';
import { createConfigServiceMock } from '../../test-utils/config-service.mock';
import { SyncScheduler } from '../sync.scheduler';

const INTERVAL_MS = 60_000;

const reconciled: SyncCycleResult = {
  status: 'reconciled',
  groupName: 'edu:org:hub:datahub-users',
  fetchedUsers: 2,
  members: 1,
  durationMs: 1234,
};

// setTimeout stays real so pending promise callbacks can be drained
const flushPromises = () => new Promise((resolve) => setTimeout(resolve, 0));

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('SyncScheduler', () => {
  let synchronize: Mock<() => Promise<SyncCycleResult>>;
  let schedulerRegistry: SchedulerRegistry;
  let scheduler: SyncScheduler;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    synchronize = vi.fn<() => Promise<SyncCycleResult>>().mockResolvedValue(reconciled);
    schedulerRegistry = new SchedulerRegistry();
    scheduler = new SyncScheduler(
      { synchronize } as unknown as GroupSyncService,
      schedulerRegistry,
      createConfigServiceMock({ 'sync.intervalSeconds': INTERVAL_MS / 1000 }),
    );
  });

  afterEach(() => {
    scheduler.onModuleDestroy();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('onModuleInit', () => {
    it('runs a cycle right away and registers the interval', () => {
      scheduler.onModuleInit();

      expect(synchronize).toHaveBeenCalledTimes(1);
      expect(schedulerRegistry.doesExist('interval', SYNC_INTERVAL_NAME)).toBe(true);
    });

    it('runs a cycle on every interval tick', async () => {
      scheduler.onModuleInit();
      await flushPromises();

      vi.advanceTimersByTime(INTERVAL_MS);
      await flushPromises();
      vi.advanceTimersByTime(INTERVAL_MS);
      await flushPromises();

      expect(synchronize).toHaveBeenCalledTimes(3);
    });
  });

  describe('runSyncCycle', () => {
    it('logs the result of a completed cycle', async () => {
      const logSpy = vi.spyOn(Logger.prototype, 'log');

      await expect(scheduler.runSyncCycle()).resolves.toBe(true);

      expect(logSpy).toHaveBeenCalledWith('Sync cycle reconciled in 1.23s');
      expect(scheduler.running).toBe(false);
    });

    it('does not start a second cycle while one is running', async () => {
      const warnSpy = vi.spyOn(Logger.prototype, 'warn');
      const cycle = deferred<SyncCycleResult>();
      synchronize.mockReturnValueOnce(cycle.promise);

      const first = scheduler.runSyncCycle();
      expect(scheduler.running).toBe(true);

      await expect(scheduler.runSyncCycle()).resolves.toBe(false);
      expect(warnSpy).toHaveBeenCalledWith('Sync already in progress, skipping');
      expect(synchronize).toHaveBeenCalledTimes(1);

      cycle.resolve(reconciled);
      await expect(first).resolves.toBe(true);
      expect(scheduler.running).toBe(false);
    });

    it('skips interval ticks that fall into a running cycle', async () => {
      const cycle = deferred<SyncCycleResult>();
      synchronize.mockReturnValueOnce(cycle.promise);
      scheduler.onModuleInit();

      vi.advanceTimersByTime(INTERVAL_MS);
      vi.advanceTimersByTime(INTERVAL_MS);
      expect(synchronize).toHaveBeenCalledTimes(1);

      cycle.resolve(reconciled);
      await flushPromises();
      vi.advanceTimersByTime(INTERVAL_MS);

      expect(synchronize).toHaveBeenCalledTimes(2);
    });

    it('logs a directory problem and keeps the schedule', async () => {
      const errorSpy = vi.spyOn(Logger.prototype, 'error');
      synchronize.mockRejectedValueOnce(
        new DirectoryProblemError('edu:org:hub:datahub-users', { resultCode: 'PROBLEM' }),
      );

      scheduler.onModuleInit();
      await flushPromises();

      expect(errorSpy).toHaveBeenCalledWith(
        expect.objectContaining({
          msg: 'Sync cycle failed',
          error: expect.objectContaining({ type: 'DirectoryProblemError' }),
        }),
      );
      expect(scheduler.running).toBe(false);

      vi.advanceTimersByTime(INTERVAL_MS);
      expect(synchronize).toHaveBeenCalledTimes(2);
    });

    it('logs a timed-out request and runs again on the next tick', async () => {
      const errorSpy = vi.spyOn(Logger.prototype, 'error');
      const timeout = new DOMException('The operation was aborted due to timeout', 'TimeoutError');
      synchronize.mockRejectedValueOnce(
        new TransportError('https://datahub.example.edu/hub/api/users', timeout),
      );

      scheduler.onModuleInit();
      await flushPromises();

      expect(errorSpy).toHaveBeenCalledWith(
        expect.objectContaining({
          error: expect.objectContaining({
            type: 'TransportError',
            message: expect.stringMatching(
              /^Request to https:\/\/datahub\.example\.edu\/hub\/api\/users timed out/,
            ),
          }),
        }),
      );

      vi.advanceTimersByTime(INTERVAL_MS);
      await flushPromises();
      expect(synchronize).toHaveBeenCalledTimes(2);
      expect(scheduler.running).toBe(false);
    });
  });

  describe('onModuleDestroy', () => {
    it('removes the interval and refuses further cycles', async () => {
      scheduler.onModuleInit();
      await flushPromises();

      scheduler.onModuleDestroy();
      vi.advanceTimersByTime(INTERVAL_MS * 3);

      expect(schedulerRegistry.doesExist('interval', SYNC_INTERVAL_NAME)).toBe(false);
      await expect(scheduler.runSyncCycle()).resolves.toBe(false);
      expect(synchronize).toHaveBeenCalledTimes(1);
    });
  });
});
