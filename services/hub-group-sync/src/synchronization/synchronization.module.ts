import { Module } from '@nestjs/common';
import { DirectoryApiModule } from '../directory-api/directory-api.module';
import { HubApiModule } from '../hub-api/hub-api.module';
import { MembershipModule } from '../membership/membership.module';
import { GroupSyncService } from './group-sync.service';

@Module({
  imports: [HubApiModule, MembershipModule, DirectoryApiModule],
  providers: [GroupSyncService],
  exports: [GroupSyncService],
})
export class SynchronizationModule {}
