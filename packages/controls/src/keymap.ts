import type { ControlCommand } from './commands';

export type KeyInput = string | number | { name?: string; sequence?: string };

export const DEFAULT_KEYMAP: Readonly<Record<string, ControlCommand>> = {
  '+': 'increment',
  '=': 'increment',
  '-': 'decrement',
  _: 'decrement',
  s: 'cycle',
  r: 'reset',
  q: 'quit',
  escape: 'quit',
  p: 'print',
  w: 'save',
  space: 'togglePause',
  n: 'step'
};

const normalizeKey = (input: KeyInput): string | null => {
  if (typeof input === 'number') {
    // Key codes carry modifier bits above the low byte
    const code = input & 0xff;
    if (code === 27) {
      return 'escape';
    }
    return code === 32 ? 'space' : String.fromCharCode(code).toLowerCase();
  }
  if (typeof input === 'string') {
    if (input === ' ') {
      return 'space';
    }
    if (input === '\u001b') {
      return 'escape';
    }
    return input.length === 1 ? input.toLowerCase() : input.toLowerCase().trim() || null;
  }
  const raw = input.sequence && input.sequence.length === 1 ? input.sequence : input.name;
  return raw ? normalizeKey(raw) : null;
};

/**
 * Translate a raw key (character, key code or readline keypress) into a command
 */
export const toControlCommand = (
  input: KeyInput,
  keymap: Readonly<Record<string, ControlCommand>> = DEFAULT_KEYMAP
): ControlCommand | null => {
  const key = normalizeKey(input);
  if (!key) {
    return null;
  }
  return Object.prototype.hasOwnProperty.call(keymap, key) ? keymap[key] : null;
};

/**
 * Split a string of key characters into commands, skipping unmapped ones
 */
export const parseKeySequence = (
  text: string,
  keymap: Readonly<Record<string, ControlCommand>> = DEFAULT_KEYMAP
): ControlCommand[] =>
  [...text].reduce<ControlCommand[]>((commands, char) => {
    const command = toControlCommand(char, keymap);
    return command ? [...commands, command] : commands;
  }, []);
