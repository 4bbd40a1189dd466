import { describe, expect, it } from 'vitest';
import { keyToMessage } from './keymap.js';
import type { KeyPress } from './keymap.js';

const NO_KEY: KeyPress = {
  upArrow: false,
  downArrow: false,
  return: false,
  escape: false,
  tab: false,
  ctrl: false,
};

function press(overrides: Partial<KeyPress>): KeyPress {
  return { ...NO_KEY, ...overrides };
}

describe('keyToMessage', () => {
  it('maps list keys', () => {
    expect(keyToMessage('', press({ upArrow: true }), 'loaded')).toEqual({ type: 'cursor/up' });
    expect(keyToMessage('', press({ downArrow: true }), 'detail')).toEqual({ type: 'cursor/down' });
    expect(keyToMessage('', press({ return: true }), 'loaded')).toEqual({ type: 'item/selected' });
    expect(keyToMessage('r', NO_KEY, 'loaded')).toEqual({ type: 'feed/refresh' });
    expect(keyToMessage('q', NO_KEY, 'empty')).toEqual({ type: 'app/quit' });
  });

  it('leaves typing to the URL field while editing', () => {
    expect(keyToMessage('q', NO_KEY, 'editing')).toBeNull();
    expect(keyToMessage('r', NO_KEY, 'editing')).toBeNull();
    expect(keyToMessage('', press({ return: true }), 'editing')).toBeNull();
    expect(keyToMessage('', press({ downArrow: true }), 'editing')).toBeNull();
  });

  it('handles escape, tab and ctrl+c in every mode', () => {
    expect(keyToMessage('', press({ escape: true }), 'loaded')).toEqual({ type: 'focus/input' });
    expect(keyToMessage('', press({ tab: true }), 'editing')).toEqual({ type: 'focus/list' });
    expect(keyToMessage('c', press({ ctrl: true }), 'editing')).toEqual({ type: 'app/quit' });
  });

  it('ignores unbound keys', () => {
    expect(keyToMessage('x', NO_KEY, 'loaded')).toBeNull();
  });
});
