/**
 * Alternate spellings accepted when parsing key names.
 *
 * Aliases are input-only; serialization always emits the canonical name.
 */

import { KEY_CODES, type KeyCode } from './codes';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

function shorthandAliases(): Array<[string, KeyCode]> {
  const aliases: Array<[string, KeyCode]> = [];
  for (const code of KEY_CODES) {
    if (code.startsWith('Key') && code.length === 4 && LETTERS.includes(code[3])) {
      aliases.push([code[3], code]);
    } else if (code.startsWith('Digit') && code.length === 6 && DIGITS.includes(code[5])) {
      aliases.push([code[5], code]);
    }
  }
  return aliases;
}

export const LEGACY_KEY_ALIASES: ReadonlyArray<readonly [string, KeyCode]> = [
  // Firefox, Chrome before 52, and WebKit GTK/WPE report the OS key this way.
  ['OSLeft', 'MetaLeft'],
  ['OSRight', 'MetaRight'],
  // Older browsers, and some current ones, drop the Audio prefix.
  ['VolumeDown', 'AudioVolumeDown'],
  ['VolumeMute', 'AudioVolumeMute'],
  ['VolumeUp', 'AudioVolumeUp'],
  // WebKit GTK/WPE.
  ['LaunchMediaPlayer', 'MediaSelect'],
];

export const KEY_CODE_ALIASES: ReadonlyArray<readonly [string, KeyCode]> = [
  ...shorthandAliases(),
  ...LEGACY_KEY_ALIASES,
];

function buildNameTable(): ReadonlyMap<string, KeyCode> {
  const table = new Map<string, KeyCode>();
  for (const code of KEY_CODES) {
    table.set(code, code);
  }
  for (const [alias, code] of KEY_CODE_ALIASES) {
    const existing = table.get(alias);
    if (existing) {
      throw new Error(`Key alias "${alias}" for ${code} collides with ${existing}`);
    }
    table.set(alias, code);
  }
  return table;
}

/** Canonical names and aliases, each mapped to exactly one key code. */
export const KEY_NAME_TABLE: ReadonlyMap<string, KeyCode> = buildNameTable();
