/**
 * State store for the notification marker
 *
 * Single read/write pattern:
 * - Read state once at the start of each run
 * - Write once at the end, only after a successful post
 *
 * A missing or corrupt file is read as the empty state so the next run
 * simply starts over.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { createLogger } from '../../shared/lib';
import { EMPTY_STATE, type NotificationState, type StoredNotificationState } from './types';

const log = createLogger('State');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Parse the raw file content into a state, tolerating any malformed input
 */
export function parseState(raw: string): NotificationState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.debug(`State file is not valid JSON, treating as empty: ${error}`);
    return { ...EMPTY_STATE };
  }

  if (!isRecord(parsed)) {
    log.debug('State file does not hold an object, treating as empty');
    return { ...EMPTY_STATE };
  }

  return {
    lastNotifiedId: stringOrNull(parsed.last_notified_video_id),
    lastNotifiedAt: stringOrNull(parsed.last_notified_at),
  };
}

/**
 * Serialize a state as indented JSON with a trailing newline
 */
export function serializeState(state: NotificationState): string {
  const stored: StoredNotificationState = {};
  if (state.lastNotifiedId !== null) {
    stored.last_notified_video_id = state.lastNotifiedId;
  }
  if (state.lastNotifiedAt !== null) {
    stored.last_notified_at = state.lastNotifiedAt;
  }
  return `${JSON.stringify(stored, null, 2)}\n`;
}

/**
 * Create a state store backed by a JSON file
 */
export function createStateStore(filePath: string) {
  return {
    /**
     * Path of the backing file
     */
    filePath,

    /**
     * Load the state; never throws
     */
    async load(): Promise<NotificationState> {
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf-8');
      } catch (error) {
        log.debug(`No readable state at ${filePath}: ${error}`);
        return { ...EMPTY_STATE };
      }
      return parseState(raw);
    },

    /**
     * Write the state, creating parent directories as needed
     *
     * The content goes to a sibling temp file first and is renamed over the
     * target, so readers never see a half-written file.
     */
    async save(state: NotificationState): Promise<void> {
      await mkdir(dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await writeFile(tempPath, serializeState(state), 'utf-8');
      await rename(tempPath, filePath);
      log.debug(`State saved to ${filePath}`);
    },

    /**
     * Record a broadcast as announced
     */
    async markNotified(broadcastId: string, at: Date = new Date()): Promise<NotificationState> {
      const state: NotificationState = {
        lastNotifiedId: broadcastId,
        lastNotifiedAt: at.toISOString(),
      };
      await this.save(state);
      return state;
    },
  };
}

/**
 * Type for the state store
 */
export type StateStore = ReturnType<typeof createStateStore>;
