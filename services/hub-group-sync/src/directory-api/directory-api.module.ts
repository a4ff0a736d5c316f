import { Module } from '@nestjs/common';
import { DirectoryApiClient } from './directory-api.client';

@Module({
  providers: [DirectoryApiClient],
  exports: [DirectoryApiClient],
})
export class DirectoryApiModule {}
