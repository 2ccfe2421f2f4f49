/**
 * Run wiring: builds the collaborators from configuration and reports the
 * outcome of one check
 */

import * as Sentry from '@sentry/node';
import { createStateStore } from '../entities/notification-state';
import { connectAndPublish } from '../features/bluesky-poster';
import { createYouTubeClient, lookupLiveBroadcast } from '../features/live-lookup';
import { resolveTemplate } from '../features/message-composer';
import { ConfigError, createLogger } from '../shared/lib';
import { DEFAULT_MESSAGE_TEMPLATE, loadConfig, type AppConfig, type Env } from './config';
import { EXIT_CODES, runCheck, type RunOutcome } from './run-check';

const log = createLogger('Notifier');

/**
 * Print the outcome and report failures to Sentry
 */
function reportOutcome(outcome: RunOutcome): void {
  switch (outcome.status) {
    case 'lookup-failed':
      log.error(outcome.message);
      Sentry.captureException(outcome.error, { tags: { source: 'youtube' } });
      break;
    case 'publish-failed':
      log.error(outcome.message);
      Sentry.captureException(outcome.error, {
        tags: { source: 'bluesky', stage: outcome.error.stage },
        extra: { broadcastId: outcome.broadcastId },
      });
      break;
    default:
      log.info(outcome.message);
  }
}

/**
 * Run one check and return the process exit code
 */
export async function main(env: Env = process.env): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`ERROR: ${error.message}`);
      return EXIT_CODES.failure;
    }
    throw error;
  }

  if (config.sentryDsn) {
    Sentry.init({
      dsn: config.sentryDsn,
      tracesSampleRate: 1.0,
    });
  }

  const stateStore = createStateStore(config.statePath);
  const youtubeClient = createYouTubeClient(config.youtube.apiKey, {
    timeoutMs: config.timeoutMs,
  });

  const outcome = await runCheck({
    stateStore,
    lookup: () => lookupLiveBroadcast(youtubeClient, config.youtube.channelId),
    resolveTemplate: () =>
      resolveTemplate({
        filePath: config.templatePath,
        configOverride: config.messageTemplate,
        builtinDefault: DEFAULT_MESSAGE_TEMPLATE,
      }),
    publish: (message, snapshot) =>
      connectAndPublish(
        {
          identifier: config.bluesky.identifier,
          password: config.bluesky.password,
        },
        {
          service: config.bluesky.service,
          timeoutMs: config.timeoutMs,
        },
        message,
        snapshot,
        { embed: config.embedMode }
      ),
    linkFacets: config.linkFacets,
  });

  reportOutcome(outcome);

  if (config.sentryDsn) {
    await Sentry.flush(2000);
  }

  return outcome.exitCode;
}
