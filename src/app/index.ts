#!/usr/bin/env node
/**
 * YouTube Live Bluesky Notifier
 *
 * A scheduled job that checks a YouTube channel for a live broadcast and
 * announces each new broadcast on Bluesky exactly once.
 */

import * as Sentry from '@sentry/node';
import { config as dotenvConfig } from 'dotenv';
import { createLogger, describeError } from '../shared/lib';
import type { Env } from './config';
import { main } from './main';
import { EXIT_CODES } from './run-check';

export type { Env };
export { main };

const log = createLogger('Notifier');

if (require.main === module) {
  dotenvConfig();

  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    async (error: unknown) => {
      log.error(`ERROR: ${describeError(error)}`);
      Sentry.captureException(error);
      await Sentry.flush(2000);
      process.exitCode = EXIT_CODES.failure;
    }
  );
}
