import { describe, it, expect } from 'vitest';
import {
  buildVideoUrl,
  composeMessage,
  extractLinkFacets,
  formatBroadcastTime,
  renderTemplate,
} from '../../src/features/message-composer';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function sliceBytes(text: string, start: number, end: number): string {
  return decoder.decode(encoder.encode(text).slice(start, end));
}

describe('buildVideoUrl', () => {
  it('uses the watch URL pattern', () => {
    expect(buildVideoUrl('abc123')).toBe('https://www.youtube.com/watch?v=abc123');
  });
});

describe('formatBroadcastTime', () => {
  it('formats in UTC+9 to the minute', () => {
    expect(formatBroadcastTime(new Date('2024-05-01T12:30:45Z'))).toBe('2024-05-01 21:30 JST');
  });

  it('rolls over the date boundary', () => {
    expect(formatBroadcastTime(new Date('2024-12-31T20:05:00Z'))).toBe('2025-01-01 05:05 JST');
  });

  it('accepts a custom offset and label', () => {
    expect(formatBroadcastTime(new Date('2024-05-01T12:30:00Z'), 0, 'UTC')).toBe(
      '2024-05-01 12:30 UTC'
    );
  });
});

describe('renderTemplate', () => {
  const values = {
    url: 'https://www.youtube.com/watch?v=abc123',
    video_id: 'abc123',
    title: 'Live Now',
    now: '2024-05-01 21:30 JST',
  };

  it('replaces every occurrence of each placeholder', () => {
    const result = renderTemplate('{title} {url} {video_id} {now} {title} {video_id}', values);

    expect(result).toBe(
      'Live Now https://www.youtube.com/watch?v=abc123 abc123 2024-05-01 21:30 JST Live Now abc123'
    );
  });

  it('leaves unknown placeholders verbatim', () => {
    expect(renderTemplate('{channel} {title}', values)).toBe('{channel} Live Now');
  });

  it('does not expand placeholders found inside substituted values', () => {
    const result = renderTemplate('{title}', { ...values, title: 'See {url}' });

    expect(result).toBe('See {url}');
  });
});

describe('extractLinkFacets', () => {
  it('returns no facets for text without links', () => {
    expect(extractLinkFacets('配信開始しました')).toEqual([]);
  });

  it('uses byte offsets after multi-byte text', () => {
    const text = '配信開始 https://www.youtube.com/watch?v=abc123';

    const facets = extractLinkFacets(text);

    expect(facets).toEqual([
      {
        byteStart: 13,
        byteEnd: 51,
        uri: 'https://www.youtube.com/watch?v=abc123',
      },
    ]);
    expect(sliceBytes(text, 13, 51)).toBe('https://www.youtube.com/watch?v=abc123');
  });

  it('counts surrogate pairs as four bytes', () => {
    const text = '🎉 http://example.test/a';

    expect(extractLinkFacets(text)).toEqual([
      { byteStart: 5, byteEnd: 26, uri: 'http://example.test/a' },
    ]);
  });

  it('finds several links and stops at whitespace', () => {
    const text = 'ライブ https://a.test/x\n次回→ https://b.test/y です';

    const facets = extractLinkFacets(text);

    expect(facets.map((f) => f.uri)).toEqual(['https://a.test/x', 'https://b.test/y']);
    for (const facet of facets) {
      expect(sliceBytes(text, facet.byteStart, facet.byteEnd)).toBe(facet.uri);
    }
  });

  it('stops at an ideographic space', () => {
    const text = 'https://a.test/x　配信';

    expect(extractLinkFacets(text)).toEqual([
      { byteStart: 0, byteEnd: 16, uri: 'https://a.test/x' },
    ]);
  });
});

describe('composeMessage', () => {
  const now = new Date('2024-05-01T12:30:00Z');

  it('renders the template and derives facets', () => {
    const message = composeMessage(
      '配信開始しました！\n{title}\n{url}\n({now})',
      { id: 'abc123', title: 'Live Now' },
      { now }
    );

    expect(message.canonicalUrl).toBe('https://www.youtube.com/watch?v=abc123');
    expect(message.text).toBe(
      '配信開始しました！\nLive Now\nhttps://www.youtube.com/watch?v=abc123\n(2024-05-01 21:30 JST)'
    );
    expect(message.linkFacets).toHaveLength(1);
    const [facet] = message.linkFacets;
    expect(sliceBytes(message.text, facet.byteStart, facet.byteEnd)).toBe(message.canonicalUrl);
  });

  it('keeps byte offsets correct under a multi-byte title', () => {
    const message = composeMessage('{title} {url}', { id: 'abc123', title: '雑談配信🎮' }, { now });

    // 4 CJK chars x 3 bytes + emoji 4 bytes + space
    expect(message.linkFacets).toEqual([
      {
        byteStart: 17,
        byteEnd: 55,
        uri: 'https://www.youtube.com/watch?v=abc123',
      },
    ]);
  });

  it('renders a missing title as empty', () => {
    const message = composeMessage('[{title}] {video_id}', { id: 'abc123' }, { now });

    expect(message.text).toBe('[] abc123');
  });

  it('falls back to title and URL when the rendered text is blank', () => {
    const message = composeMessage('  \n ', { id: 'abc123', title: 'Live Now' }, { now });

    expect(message.text).toBe('Live Now\nhttps://www.youtube.com/watch?v=abc123');
  });

  it('falls back to the URL alone without a title', () => {
    const message = composeMessage('{title}', { id: 'abc123' }, { now });

    expect(message.text).toBe('https://www.youtube.com/watch?v=abc123');
    expect(message.linkFacets).toEqual([
      { byteStart: 0, byteEnd: 38, uri: 'https://www.youtube.com/watch?v=abc123' },
    ]);
  });

  it('omits facets when disabled', () => {
    const message = composeMessage('{url}', { id: 'abc123' }, { now, linkFacets: false });

    expect(message.linkFacets).toEqual([]);
  });
});
