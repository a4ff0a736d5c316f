import { Module } from '@nestjs/common';
import { HubApiService } from './hub-api.service';
import { HubHttpClient } from './hub-http-client';

@Module({
  providers: [HubHttpClient, HubApiService],
  exports: [HubApiService],
})
export class HubApiModule {}
