/**
 * Link facet extraction
 *
 * Bluesky rich-text facets address the UTF-8 bytes of the post text, not
 * JavaScript string indices. Offsets are computed by encoding the text
 * before each match.
 */

import type { LinkFacet } from '../model';

/** A run of non-whitespace characters starting with an http(s) scheme */
const URL_PATTERN = /https?:\/\/\S+/g;

const encoder = new TextEncoder();

function utf8Length(text: string): number {
  return encoder.encode(text).length;
}

/**
 * Find every http(s) URL in the text and record its byte range
 */
export function extractLinkFacets(text: string): LinkFacet[] {
  const facets: LinkFacet[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const uri = match[0];
    const byteStart = utf8Length(text.slice(0, match.index ?? 0));
    facets.push({
      byteStart,
      byteEnd: byteStart + utf8Length(uri),
      uri,
    });
  }

  return facets;
}
