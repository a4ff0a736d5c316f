import { LogsDiagnosticDataPolicy } from '@hub-sync/utils';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const AppConfigSchema = z
  .object({
    nodeEnv: z
      .enum(['development', 'production', 'test'])
      .prefault('production')
      .describe('Specifies the environment in which the application is running'),
    logLevel: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .prefault('info')
      .describe('The log level at which the service outputs (pino)'),
    logsDiagnosticsDataPolicy: z
      .enum(LogsDiagnosticDataPolicy)
      .prefault(LogsDiagnosticDataPolicy.CONCEAL)
      .describe(
        'Controls whether user names and group paths are logged in full or smeared. ' +
          'Parsed here only so a typo fails start-up; Smeared reads the variable itself',
      ),
  })
  .transform((c) => ({
    ...c,
    isDev: c.nodeEnv === 'development',
  }));

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigNamespaced = { app: AppConfig };

export const appConfig = registerAs(
  'app',
  (): AppConfig =>
    AppConfigSchema.parse({
      nodeEnv: process.env.NODE_ENV,
      logLevel: process.env.LOG_LEVEL,
      logsDiagnosticsDataPolicy: process.env.LOGS_DIAGNOSTICS_DATA_POLICY,
    }),
);
