/**
 * @license
 * Copyright 2025 BrowserOS
 */

export {Logger, logger, isLogLevel, LOG_LEVELS} from './logger.js';
export type {LogLevel, LoggerOptions} from './logger.js';
