/**
 * Logging setup.
 *
 * The library logs through LogTape loggers under the `entry-charts` category and
 * never configures sinks on its own. Hosts that want the output call
 * {@link configureLogging} once at startup, or include the category in their
 * own LogTape configuration.
 *
 * Usage:
 *   import { getChartLogger } from './logging';
 *
 *   const logger = getChartLogger('chart');
 *   logger.debug('Skipped draw of {width}x{height} region', { width, height });
 */

import { configure, getConsoleSink, getLogger, type LogLevel, type Logger } from '@logtape/logtape';

export const LOG_CATEGORY = 'entry-charts';

export function getChartLogger(area: string): Logger {
  return getLogger([LOG_CATEGORY, area]);
}

export interface LoggingOptions {
  /** Lowest level written to the console (default: `'info'`). */
  readonly level?: LogLevel;
}

/**
 * Sends chart logs to the console. Replaces any previous LogTape configuration.
 */
export async function configureLogging(options: LoggingOptions = {}): Promise<void> {
  await configure({
    reset: true,
    sinks: {
      console: getConsoleSink(),
    },
    loggers: [
      {
        category: [LOG_CATEGORY],
        lowestLevel: options.level ?? 'info',
        sinks: ['console'],
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  });
}
