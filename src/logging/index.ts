export {
  type LogLevel,
  type Logger,
  setLogLevel,
  getLogLevel,
  isLevelEnabled,
  createLogger,
} from './log';
