import Parser from 'rss-parser';
import * as cheerio from 'cheerio';
import crypto from 'crypto';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { getConfig } from '../config.js';
import { FetchError, InputError, ParseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface FeedItem {
  readonly id: string;
  readonly title: string;
  readonly link: string;
  readonly published?: Date;
  readonly summary: string;
}

export interface Feed {
  readonly title: string;
  readonly link?: string;
  readonly description?: string;
  readonly items: readonly FeedItem[];
}

/** Anything that can turn a URL into a Feed. The shell only depends on this. */
export interface FeedSource {
  fetch(url: string): Promise<Feed>;
}

export interface FeedFetcherConfig {
  timeoutMs: number;
  userAgent: string;
  fetchImpl: typeof fetch;
}

type ParsedFeed = Parser.Output<object>;

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'file:']);
const HAS_SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Normalise user input into a feed URL. A bare host such as
 * `example.com/rss` is taken to mean https.
 */
export function parseFeedUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InputError('Enter a feed URL');
  }

  const candidate = HAS_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch (err) {
    throw new InputError(`Not a valid URL: ${trimmed}`, { cause: err });
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new InputError(`Unsupported URL scheme: ${url.protocol}`);
  }
  return url;
}

export class FeedFetcher implements FeedSource {
  private readonly parser: Parser<object, object>;
  private readonly config: FeedFetcherConfig;

  constructor(config: Partial<FeedFetcherConfig> = {}) {
    const env = getConfig();
    this.config = {
      timeoutMs: config.timeoutMs ?? env.FEED_TIMEOUT_MS,
      userAgent: config.userAgent ?? env.FEED_USER_AGENT,
      fetchImpl: config.fetchImpl ?? fetch,
    };
    this.parser = new Parser<object, object>();
  }

  /** Download and parse one feed. Single attempt, no retry. */
  async fetch(rawUrl: string): Promise<Feed> {
    const url = parseFeedUrl(rawUrl);
    logger.debug({ url: url.href }, 'Fetching feed');

    const xml = await this.download(url);
    const feed = toFeed(await this.parse(xml));

    logger.debug({ url: url.href, title: feed.title, items: feed.items.length }, 'Feed fetched');
    return feed;
  }

  private async download(url: URL): Promise<string> {
    if (url.protocol === 'file:') {
      try {
        return await readFile(fileURLToPath(url), 'utf-8');
      } catch (err) {
        throw new FetchError(`Cannot read ${url.href}: ${describe(err)}`, { cause: err });
      }
    }

    let response: Response;
    try {
      response = await this.config.fetchImpl(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'application/rss+xml, application/atom+xml, application/xml, text/xml',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new FetchError(`Request timed out after ${this.config.timeoutMs}ms`, { cause: err });
      }
      throw new FetchError(`Cannot reach ${url.host}: ${describe(err)}`, { cause: err });
    }

    logger.debug(
      { url: url.href, status: response.status, contentType: response.headers.get('content-type') },
      'Feed response received',
    );

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText} when fetching ${url.href}`);
    }

    try {
      return await response.text();
    } catch (err) {
      throw new FetchError(`Connection lost while reading ${url.href}: ${describe(err)}`, { cause: err });
    }
  }

  private async parse(xml: string): Promise<ParsedFeed> {
    try {
      return await this.parser.parseString(xml);
    } catch (err) {
      throw new ParseError(`Not a valid RSS or Atom feed (${describe(err)})`, { cause: err });
    }
  }
}

function toFeed(output: ParsedFeed): Feed {
  return {
    title: plain(output.title) || 'Unknown Feed',
    link: text(output.link) || undefined,
    description: plain(output.description) || undefined,
    items: Object.freeze(output.items.map(toItem)),
  };
}

function toItem(item: Parser.Item, index: number): FeedItem {
  const link = text(item.link);
  return Object.freeze({
    id: itemId(text(item.guid) || link || `#${index}`),
    title: plain(item.title) || 'No title',
    link,
    published: parseDate(text(item.isoDate) || text(item.pubDate)),
    summary: text(item.contentSnippet) || plain(item.summary) || plain(item.content),
  });
}

/**
 * xml2js hands back an object instead of a string for elements that carry
 * attributes or child elements: `{ _: 'text', $: { ...attrs }, child: [...] }`.
 */
function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return value.map(text).filter(Boolean).join(' ');
  if (value !== null && typeof value === 'object') {
    return Object.entries(value)
      .filter(([key]) => key !== '$')
      .map(([, child]) => text(child))
      .filter(Boolean)
      .join(' ');
  }
  return '';
}

// Atom allows escaped HTML in title and summary; only RSS gets a snippet from rss-parser.
function plain(value: unknown): string {
  const raw = text(value);
  if (!raw.includes('<')) return raw;
  return cheerio.load(raw, null, false).root().text().replace(/\s+/g, ' ').trim();
}

function itemId(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex').slice(0, 16);
}

function parseDate(value: string): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

// undici reports "fetch failed" and keeps the useful part in `cause`.
function describe(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  return err.cause instanceof Error ? err.cause.message : err.message;
}
