import type { AppMessage, AppMode } from './stores/app-state.js';

/** The subset of Ink's key flags the shell reacts to. */
export interface KeyPress {
  upArrow: boolean;
  downArrow: boolean;
  return: boolean;
  escape: boolean;
  tab: boolean;
  ctrl: boolean;
}

export function keyToMessage(input: string, key: KeyPress, mode: AppMode): AppMessage | null {
  if (key.ctrl && input === 'c') return { type: 'app/quit' };
  if (key.escape) return { type: 'focus/input' };
  if (key.tab) return { type: 'focus/list' };

  // Everything else belongs to the text field while it has focus.
  if (mode === 'editing') return null;

  if (key.upArrow) return { type: 'cursor/up' };
  if (key.downArrow) return { type: 'cursor/down' };
  if (key.return) return { type: 'item/selected' };

  switch (input) {
    case 'r':
      return { type: 'feed/refresh' };
    case 'q':
      return { type: 'app/quit' };
    default:
      return null;
  }
}
