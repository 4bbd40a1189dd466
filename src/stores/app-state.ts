import type { Feed, FeedItem } from '../services/feed-fetcher.js';
import { parseFeedUrl } from '../services/feed-fetcher.js';
import type { FeedError } from '../utils/errors.js';
import { InputError } from '../utils/errors.js';
import { pluralize } from '../utils/format.js';

export type AppMode = 'empty' | 'loaded' | 'detail' | 'editing' | 'terminated';

export type StatusKind = 'info' | 'loading' | 'error';

export interface StatusMessage {
  kind: StatusKind;
  text: string;
}

export interface PendingFetch {
  requestId: number;
  url: string;
  /** Mode when the fetch began; focus moved to the input since then is kept. */
  startedIn: AppMode;
}

export interface AppState {
  mode: AppMode;
  feed: Feed | null;
  /** URL the current feed was loaded from; refresh re-fetches it. */
  feedUrl: string | null;
  /** Highlighted item index, or null when no feed or an empty feed is loaded. */
  selection: number | null;
  input: string;
  pending: PendingFetch | null;
  nextRequestId: number;
  status: StatusMessage;
}

export type AppMessage =
  | { type: 'input/changed'; value: string }
  | { type: 'input/submitted'; value: string }
  | { type: 'cursor/up' }
  | { type: 'cursor/down' }
  | { type: 'item/selected' }
  | { type: 'feed/refresh' }
  | { type: 'focus/input' }
  | { type: 'focus/list' }
  | { type: 'app/quit' }
  | { type: 'fetch/succeeded'; requestId: number; feed: Feed }
  | { type: 'fetch/failed'; requestId: number; error: FeedError };

export interface FetchCommand {
  type: 'fetch';
  requestId: number;
  url: string;
}

export type AppCommand = FetchCommand;

export type Transition = [AppState, AppCommand | null];

export const REFRESH_IGNORED = 'Refresh ignored: a feed is still loading';

export function createInitialState(initialUrl?: string): AppState {
  return {
    mode: initialUrl ? 'empty' : 'editing',
    feed: null,
    feedUrl: null,
    selection: null,
    input: initialUrl ?? '',
    pending: null,
    nextRequestId: 1,
    status: { kind: 'info', text: 'Enter an RSS feed URL to get started' },
  };
}

export function selectedItem(state: AppState): FeedItem | null {
  if (!state.feed || state.selection === null) return null;
  return state.feed.items[state.selection] ?? null;
}

/**
 * The whole state machine. Pure: side effects are returned as a command for
 * the store to run, and their outcome comes back as another message.
 */
export function transition(state: AppState, message: AppMessage): Transition {
  if (state.mode === 'terminated') return [state, null];

  switch (message.type) {
    case 'input/changed':
      return [{ ...state, input: message.value }, null];

    case 'input/submitted':
      return submit(state, message.value);

    case 'cursor/up':
      return [moveSelection(state, -1), null];

    case 'cursor/down':
      return [moveSelection(state, 1), null];

    case 'item/selected':
      if (state.mode !== 'loaded' || state.selection === null) return [state, null];
      return [{ ...state, mode: 'detail' }, null];

    case 'feed/refresh':
      if ((state.mode !== 'loaded' && state.mode !== 'detail') || !state.feedUrl) return [state, null];
      if (state.pending) {
        return [{ ...state, status: { kind: 'info', text: REFRESH_IGNORED } }, null];
      }
      return startFetch(state, state.feedUrl);

    case 'focus/input':
      return state.mode === 'editing' ? [state, null] : [{ ...state, mode: 'editing' }, null];

    case 'focus/list':
      if ((state.mode !== 'editing' && state.mode !== 'detail') || !state.feed) return [state, null];
      return [{ ...state, mode: 'loaded' }, null];

    case 'app/quit':
      return [{ ...state, mode: 'terminated' }, null];

    case 'fetch/succeeded': {
      const { pending } = state;
      if (!pending || pending.requestId !== message.requestId) return [state, null];
      const { feed } = message;
      return [
        {
          ...state,
          mode: state.mode === 'editing' && pending.startedIn !== 'editing' ? 'editing' : 'loaded',
          feed,
          feedUrl: pending.url,
          selection: feed.items.length > 0 ? 0 : null,
          pending: null,
          status: { kind: 'info', text: `Loaded: ${feed.title} (${pluralize(feed.items.length, 'item')})` },
        },
        null,
      ];
    }

    case 'fetch/failed':
      if (!state.pending || state.pending.requestId !== message.requestId) return [state, null];
      return [
        { ...state, pending: null, status: { kind: 'error', text: `Error: ${message.error.message}` } },
        null,
      ];
  }
}

function submit(state: AppState, value: string): Transition {
  if (state.pending) {
    return [{ ...state, input: value, status: { kind: 'info', text: `Still loading ${state.pending.url}` } }, null];
  }

  let url: URL;
  try {
    url = parseFeedUrl(value);
  } catch (err) {
    if (!(err instanceof InputError)) throw err;
    return [{ ...state, input: value, status: { kind: 'error', text: `Error: ${err.message}` } }, null];
  }
  return startFetch({ ...state, input: url.href }, url.href);
}

function startFetch(state: AppState, url: string): Transition {
  const requestId = state.nextRequestId;
  return [
    {
      ...state,
      pending: { requestId, url, startedIn: state.mode },
      nextRequestId: requestId + 1,
      status: { kind: 'loading', text: `Loading feed: ${url}...` },
    },
    { type: 'fetch', requestId, url },
  ];
}

function moveSelection(state: AppState, delta: number): AppState {
  if (state.mode !== 'loaded' && state.mode !== 'detail') return state;
  if (!state.feed || state.selection === null) return state;

  const last = state.feed.items.length - 1;
  const next = Math.min(Math.max(state.selection + delta, 0), last);
  return next === state.selection ? state : { ...state, selection: next };
}
