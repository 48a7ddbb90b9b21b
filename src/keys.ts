import type { Key } from 'ink';
import type { KeyInput } from './session';

export type KeyFlags = Partial<
  Pick<
    Key,
    'upArrow' | 'downArrow' | 'pageUp' | 'pageDown' | 'return' | 'escape' | 'ctrl' | 'meta' | 'tab' | 'backspace' | 'delete'
  >
>;

/** Maps an ink keypress onto the session's key vocabulary. */
export const toKeyInput = (input: string, key: KeyFlags): KeyInput | undefined => {
  if (key.ctrl && input === 'c') return { kind: 'interrupt' };
  if (key.return) return { kind: 'enter' };
  if (key.escape) return { kind: 'escape' };
  if (key.upArrow) return { kind: 'up' };
  if (key.downArrow) return { kind: 'down' };
  if (key.pageUp) return { kind: 'pageUp' };
  if (key.pageDown) return { kind: 'pageDown' };
  // Most terminals send DEL for Backspace, which ink reports as `delete`.
  if (key.backspace || key.delete) return { kind: 'erase' };
  if (key.tab) return { kind: 'tab' };
  if (key.ctrl || key.meta) return undefined;
  return input.length > 0 ? { kind: 'char', text: input } : undefined;
};
