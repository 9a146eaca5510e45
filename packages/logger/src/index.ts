export { configureLogger, formatLabel, getLogger, type Logger, type LoggerOverrides } from './logger.js';
export { LOG_LEVELS, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig, type LogLevel } from './env.schema.js';
