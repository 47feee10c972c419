/**
 * Logger utility using pino
 * Every line carries `name: "vertex-md"`; modules add their own child bindings
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

export const LOGGER_NAME = 'vertex-md';

let _logger: pino.Logger | null = null;

/**
 * Root logger, built from the config on first use
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    const transport = config.logFormat === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        }
      : undefined;

    _logger = pino({
      name: LOGGER_NAME,
      level: config.logLevel,
      transport,
    });
  }
  return _logger;
}

/**
 * Child logger for one module, e.g. `createLogger({ module: 'convert' })`
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Drop the cached logger so the next call picks up the current config
 */
export function resetLogger(): void {
  _logger = null;
}
