import { addColors, createLogger, format, transports } from 'winston';
import type { Logger } from 'winston';
import configManager from './config';

const { app } = configManager.get();

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  trace: 6,
};

addColors({ trace: 'magenta' });

const logger: Logger = createLogger({
  level: app.logLevel,
  levels,
  silent: app.environment === 'test' && process.env.LOG_IN_TESTS !== 'true',
  transports: [
    new transports.Console({
      level: app.logLevel,
      // Keep stdout for the report itself
      stderrLevels: Object.keys(levels),
      format: format.combine(format.timestamp(), format.cli()),
    }),
  ],
});

export default logger;
