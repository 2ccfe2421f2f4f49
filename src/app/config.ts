/**
 * Environment configuration for the notifier
 */

import { EMBED_MODES, type EmbedMode } from '../features/bluesky-poster';
import { ConfigError } from '../shared/lib';

/**
 * Environment variables read by the notifier
 */
export interface Env {
  // YouTube API
  YOUTUBE_API_KEY?: string;
  YOUTUBE_CHANNEL_ID?: string;

  // Bluesky credentials
  BLUESKY_HANDLE?: string;
  BLUESKY_APP_PASSWORD?: string;
  BLUESKY_SERVICE?: string;

  // Files
  STATE_PATH?: string;
  TEMPLATE_PATH?: string;

  // Post content
  MESSAGE_TEMPLATE?: string;
  EMBED_MODE?: string;
  LINK_FACETS?: string;

  // Network
  HTTP_TIMEOUT_MS?: string;

  // Sentry (optional)
  SENTRY_DSN?: string;
}

/**
 * Validated configuration for one run
 */
export interface AppConfig {
  youtube: {
    apiKey: string;
    channelId: string;
  };
  bluesky: {
    identifier: string;
    password: string;
    service: string;
  };
  statePath: string;
  templatePath: string;
  messageTemplate?: string;
  embedMode: EmbedMode;
  linkFacets: boolean;
  timeoutMs: number;
  sentryDsn?: string;
}

/** Default location of the state file */
export const DEFAULT_STATE_PATH = '.state/state.json';

/** Default template file */
export const DEFAULT_TEMPLATE_PATH = 'template.txt';

/** Default PDS service */
export const DEFAULT_BLUESKY_SERVICE = 'https://bsky.social';

/** Default network timeout */
export const DEFAULT_TIMEOUT_MS = 20_000;

/**
 * Template used when neither a template file nor MESSAGE_TEMPLATE is set
 */
export const DEFAULT_MESSAGE_TEMPLATE = '配信開始しました！\n{title}\n{url}\n({now})';

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseEmbedMode(value: string | undefined): EmbedMode {
  const mode = optional(value)?.toLowerCase() ?? 'external';
  const match = EMBED_MODES.find((candidate) => candidate === mode);
  if (!match) {
    throw new ConfigError(`EMBED_MODE must be one of ${EMBED_MODES.join(', ')} (got "${value}")`);
  }
  return match;
}

function parseBoolean(key: string, value: string | undefined, defaultValue: boolean): boolean {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return defaultValue;
  }
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`${key} must be a boolean (got "${value}")`);
}

function parsePositiveInt(key: string, value: string | undefined, defaultValue: number): number {
  const raw = optional(value);
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer (got "${value}")`);
  }
  return parsed;
}

/**
 * Build the run configuration from environment variables
 *
 * @throws ConfigError listing every missing required variable
 */
export function loadConfig(env: Env): AppConfig {
  const apiKey = optional(env.YOUTUBE_API_KEY);
  const channelId = optional(env.YOUTUBE_CHANNEL_ID);
  const identifier = optional(env.BLUESKY_HANDLE);
  const password = optional(env.BLUESKY_APP_PASSWORD);

  if (!apiKey || !channelId || !identifier || !password) {
    const required: Array<[string, string | undefined]> = [
      ['YOUTUBE_API_KEY', apiKey],
      ['YOUTUBE_CHANNEL_ID', channelId],
      ['BLUESKY_HANDLE', identifier],
      ['BLUESKY_APP_PASSWORD', password],
    ];
    const missing = required
      .filter(([, value]) => !value)
      .map(([key]) => key);
    throw new ConfigError(`Missing required env: ${missing.join(', ')}`);
  }

  return {
    youtube: { apiKey, channelId },
    bluesky: {
      identifier,
      password,
      service: optional(env.BLUESKY_SERVICE) ?? DEFAULT_BLUESKY_SERVICE,
    },
    statePath: optional(env.STATE_PATH) ?? DEFAULT_STATE_PATH,
    templatePath: optional(env.TEMPLATE_PATH) ?? DEFAULT_TEMPLATE_PATH,
    // Kept untrimmed: leading/trailing newlines are part of the template
    messageTemplate: env.MESSAGE_TEMPLATE || undefined,
    embedMode: parseEmbedMode(env.EMBED_MODE),
    linkFacets: parseBoolean('LINK_FACETS', env.LINK_FACETS, true),
    timeoutMs: parsePositiveInt('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    sentryDsn: optional(env.SENTRY_DSN),
  };
}
