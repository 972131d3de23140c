export { getLogger, setLoggerDestination, formatLabel, type Logger } from './pino-logger.js';
export { logLevelsSchema, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
