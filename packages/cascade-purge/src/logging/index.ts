export {
  componentLogger,
  createLogger,
  type Logger,
  type LoggerOptions,
  type PurgeComponent,
} from "./logger";
