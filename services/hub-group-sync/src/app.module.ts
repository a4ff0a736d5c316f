import { createLoggerOptions } from '@hub-sync/logger';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { type AppConfig, appConfig, directoryConfig, hubConfig, syncConfig } from './config';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [appConfig, hubConfig, directoryConfig, syncConfig],
    }),
    LoggerModule.forRootAsync({
      useFactory(appConfigValue: AppConfig) {
        return createLoggerOptions({
          level: appConfigValue.logLevel,
          pretty: appConfigValue.nodeEnv !== 'production',
        });
      },
      inject: [appConfig.KEY],
    }),
    SchedulerModule,
  ],
})
export class AppModule {}
