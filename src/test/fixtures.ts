import type { Feed, FeedItem, FeedSource } from '../services/feed-fetcher.js';

export const RSS_ABC = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example Feed</title>
    <link>https://example.com/</link>
    <description>Test channel</description>
    <item>
      <title>A</title>
      <link>https://example.com/a</link>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
      <description>First item</description>
    </item>
    <item>
      <title>B</title>
      <link>https://example.com/b</link>
      <description>Second item</description>
    </item>
    <item>
      <title>C</title>
      <description>Third item</description>
    </item>
  </channel>
</rss>`;

export const ATOM_TWO = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <id>urn:example:atom</id>
  <updated>2025-02-02T08:30:00Z</updated>
  <entry>
    <title>First</title>
    <link href="https://example.com/1"/>
    <id>urn:example:1</id>
    <updated>2025-02-01T08:30:00Z</updated>
    <summary>One</summary>
  </entry>
  <entry>
    <title>Second</title>
    <link href="https://example.com/2"/>
    <id>urn:example:2</id>
    <updated>2025-02-02T08:30:00Z</updated>
    <summary>Two</summary>
  </entry>
</feed>`;

export function makeItem(title: string, overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    id: `id-${title}`,
    title,
    link: `https://example.com/${title.toLowerCase()}`,
    summary: `Summary of ${title}`,
    ...overrides,
  };
}

export function makeFeed(titles: string[], title = 'Example'): Feed {
  return { title, items: titles.map((t) => makeItem(t)) };
}

type CannedResponse = Feed | Error | (() => Promise<Feed>);

/** In-process feed source: each URL answers from a queue of canned responses. */
export class FakeFeedSource implements FeedSource {
  readonly calls: string[] = [];
  private readonly responses = new Map<string, CannedResponse[]>();

  respond(url: string, ...responses: CannedResponse[]): this {
    this.responses.set(url, [...(this.responses.get(url) ?? []), ...responses]);
    return this;
  }

  async fetch(url: string): Promise<Feed> {
    this.calls.push(url);
    const next = this.responses.get(url)?.shift();
    if (next === undefined) throw new Error(`no response queued for ${url}`);
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next();
    return next;
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
