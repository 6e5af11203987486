export { Logger, createLogger, parseLogLevel, errorMessage } from './logger.js';
export { nowIso, toIsoDate, parseDateLoose } from './date.js';
export { env, envNumber } from './env.js';
