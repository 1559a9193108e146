import type { Logger } from 'pino';
import type { Settings } from './config/settings.js';
import { errorMessage, isFatalError } from './errors.js';
import { startAdapter, type StartOptions } from './lifecycle/index.js';

export type ExitFn = (code: number) => void;

const processExit: ExitFn = (code) => process.exit(code);

export interface MainOptions extends StartOptions {
  exit?: ExitFn;
}

/**
 * Log an unrecoverable error at fatal level and exit with status 1.
 */
export function exitFatal(logger: Logger, err: unknown, exit: ExitFn = processExit): void {
  if (isFatalError(err)) {
    const cause = err.cause === undefined ? undefined : errorMessage(err.cause);
    logger.fatal({ cause }, err.message);
  } else {
    logger.fatal({ err }, 'Unexpected error');
  }
  logger.flush();
  exit(1);
}

/**
 * Start the adapter and supervise it until it stops. Exits 0 after a clean
 * stop and 1 after any failure; never rejects.
 */
export async function main(settings: Settings, logger: Logger, options: MainOptions = {}): Promise<void> {
  const { exit = processExit, ...startOptions } = options;
  logger.debug({ settings: settings.entries().map(([name]) => name) }, 'Settings bound');

  try {
    const { controller } = await startAdapter(settings, logger, startOptions);
    await controller.run();
  } catch (err) {
    exitFatal(logger, err, exit);
    return;
  }

  logger.flush();
  // The metrics listener would otherwise keep the process alive
  exit(0);
}
