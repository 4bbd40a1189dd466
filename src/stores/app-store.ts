import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { FeedSource } from '../services/feed-fetcher.js';
import { toFeedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createInitialState, REFRESH_IGNORED, transition } from './app-state.js';
import type { AppMessage, AppState, FetchCommand } from './app-state.js';

interface AppStore {
  state: AppState;
  /** Resolves once the message, and any fetch it started, has been applied. */
  dispatch: (message: AppMessage) => Promise<void>;
}

export type AppStoreApi = StoreApi<AppStore>;

export function createAppStore(source: FeedSource, initialUrl?: string): AppStoreApi {
  return createStore<AppStore>()((set, get) => {
    const dispatch = async (message: AppMessage): Promise<void> => {
      const current = get().state;
      const [next, command] = transition(current, message);

      if (message.type === 'feed/refresh' && current.pending && next.status.text === REFRESH_IGNORED) {
        logger.info({ pending: current.pending.url }, 'Refresh ignored while a fetch is in flight');
      }
      if (next !== current) {
        set({ state: next });
      }
      if (command) {
        await dispatch(await runFetch(command));
      }
    };

    const runFetch = async (command: FetchCommand): Promise<AppMessage> => {
      const started = Date.now();
      try {
        const feed = await source.fetch(command.url);
        logger.info(
          { url: command.url, items: feed.items.length, ms: Date.now() - started },
          'Feed loaded',
        );
        return { type: 'fetch/succeeded', requestId: command.requestId, feed };
      } catch (err) {
        const error = toFeedError(err);
        logger.warn({ url: command.url, kind: error.kind, err: error.message }, 'Feed load failed');
        return { type: 'fetch/failed', requestId: command.requestId, error };
      }
    };

    return { state: createInitialState(initialUrl), dispatch };
  });
}
