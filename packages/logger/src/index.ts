export {
  createLoggerOptions,
  developmentTarget,
  type LoggerOptionsInput,
  productionTarget,
  REDACTED_LOG_PATHS,
} from './options';
