export type FeedErrorKind = 'fetch' | 'parse' | 'input';

/** Base class for every failure the shell reports in its status bar. */
export abstract class FeedError extends Error {
  abstract readonly kind: FeedErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or transport failure: DNS, refused connection, timeout, non-2xx status. */
export class FetchError extends FeedError {
  readonly kind = 'fetch';
}

/** Content that is not XML, or XML that is not an RSS/Atom feed. */
export class ParseError extends FeedError {
  readonly kind = 'parse';
}

/** Empty or unusable URL submitted by the user. */
export class InputError extends FeedError {
  readonly kind = 'input';
}

export function toFeedError(err: unknown): FeedError {
  if (err instanceof FeedError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new FetchError(message, { cause: err });
}
