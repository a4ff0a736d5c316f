import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { SynchronizationModule } from '../synchronization/synchronization.module';
import { SyncScheduler } from './sync.scheduler';

@Module({
  imports: [ScheduleModule.forRoot(), SynchronizationModule],
  providers: [SyncScheduler],
})
export class SchedulerModule {}
