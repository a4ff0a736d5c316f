import path from 'node:path';
import type { Params } from 'nestjs-pino';
import type { LevelWithSilent } from 'pino';

export const productionTarget = {
  target: 'pino/file',
};

export const developmentTarget = {
  // pino loads transports in a worker thread, so the pretty printer is referenced by path
  target: path.resolve(__dirname, './development'),
};

export const REDACTED_LOG_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'request.headers.authorization',
  'request.headers.Authorization',
];

export interface LoggerOptionsInput {
  level: LevelWithSilent;
  pretty: boolean;
}

export function createLoggerOptions({ level, pretty }: LoggerOptionsInput): Params {
  return {
    renameContext: pretty ? 'caller' : undefined,
    pinoHttp: {
      level,
      redact: {
        paths: REDACTED_LOG_PATHS,
        censor: () => '[Redacted]',
      },
      transport: pretty ? developmentTarget : productionTarget,
    },
  };
}
