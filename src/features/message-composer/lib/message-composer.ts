/**
 * Message composition
 *
 * Renders the resolved template against a broadcast and derives link facets
 * from the final text.
 */

import type { BroadcastSnapshot } from '../../../entities/broadcast';
import type { ComposeOptions, ComposedMessage, TemplateValues } from '../model';
import { extractLinkFacets } from './link-facets';

/** Offset of Japan Standard Time from UTC */
const JST_OFFSET_MINUTES = 9 * 60;

/** Placeholders recognised in templates */
const PLACEHOLDER_PATTERN = /\{(url|video_id|title|now)\}/g;

/**
 * Build a YouTube video URL from a video ID
 */
export function buildVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format an instant as `YYYY-MM-DD HH:mm <label>` in a fixed UTC offset
 *
 * The host time zone is never consulted.
 */
export function formatBroadcastTime(
  date: Date,
  offsetMinutes: number = JST_OFFSET_MINUTES,
  label: string = 'JST'
): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const datePart = `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const timePart = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}`;
  return `${datePart} ${timePart} ${label}`;
}

/**
 * Replace every known placeholder in a single pass
 *
 * Substituted values are not scanned again; unknown placeholders stay as-is.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (_token, name: keyof TemplateValues) => values[name]);
}

/**
 * Post text used when the rendered template is blank
 */
function fallbackText(title: string | undefined, url: string): string {
  const trimmedTitle = title?.trim();
  return trimmedTitle ? `${trimmedTitle}\n${url}` : url;
}

/**
 * Compose the post for a broadcast
 */
export function composeMessage(
  template: string,
  snapshot: BroadcastSnapshot,
  options: ComposeOptions = {}
): ComposedMessage {
  const { now = new Date(), linkFacets = true } = options;
  const canonicalUrl = buildVideoUrl(snapshot.id);

  const rendered = renderTemplate(template, {
    url: canonicalUrl,
    video_id: snapshot.id,
    title: snapshot.title ?? '',
    now: formatBroadcastTime(now),
  });

  const text = rendered.trim() === '' ? fallbackText(snapshot.title, canonicalUrl) : rendered;

  return {
    text,
    canonicalUrl,
    linkFacets: linkFacets ? extractLinkFacets(text) : [],
  };
}
