/**
 * Physical key identity: classification, labels, and name parsing.
 */

import { Option } from 'effect';
import { KEY_NAME_TABLE } from './key-code/aliases';
import { KEY_CODE_CLASS } from './key-code/classes';
import { KEY_CODES_BY_CLASS, type KeyCode } from './key-code/codes';
import { KEY_CODE_LABELS } from './key-code/labels';
import type { KeyCodeClass, LayoutQuery } from './key-code/types';

export type { KeyCode, KeyCodeClass, LayoutQuery } from './key-code/types';
export { KEY_CODE_CLASSES } from './key-code/types';
export { KEY_CODES, KEY_CODES_BY_CLASS, isKeyCode } from './key-code/codes';
export { KEY_CODE_ALIASES, LEGACY_KEY_ALIASES } from './key-code/aliases';

/** Lowercase letter with no single-character uppercase form. */
const SHARP_S = 'ß';

export function classifyKeyCode(code: KeyCode): KeyCodeClass {
  const keyClass = KEY_CODE_CLASS.get(code);
  if (!keyClass) {
    throw new Error(`Key code ${code} has no class`);
  }
  return keyClass;
}

export function keyCodesInClass(keyClass: KeyCodeClass): readonly KeyCode[] {
  return KEY_CODES_BY_CLASS[keyClass];
}

/**
 * Label for the key on a US layout. Used whenever no layout information is
 * available, and always for keys outside the writing system block.
 */
export function keyCodeLabel(code: KeyCode): string {
  return KEY_CODE_LABELS[code];
}

/** Canonical name of the key; the only spelling ever written out. */
export function keyCodeName(code: KeyCode): string {
  return code;
}

/**
 * Exact, case-sensitive lookup over canonical names and known aliases
 * (single letters and digits, `OSLeft`, `VolumeUp`, `LaunchMediaPlayer`, ...).
 */
export function parseKeyCode(text: string): Option.Option<KeyCode> {
  return Option.fromNullable(KEY_NAME_TABLE.get(text));
}

/**
 * Uppercases a glyph reported by the layout. `ß` is kept as is: uppercasing
 * it yields `SS`, which is not what the key types.
 */
export function normalizeLayoutGlyph(glyph: string): string {
  return glyph === SHARP_S ? glyph : glyph.toUpperCase();
}

function queryLayout(query: LayoutQuery, code: KeyCode): Option.Option<string> {
  try {
    return query(code);
  } catch {
    return Option.none();
  }
}

/**
 * Label for the key under the user's keyboard layout.
 *
 * Only writing system keys consult `query`; every other key, and any writing
 * system key the query has no glyph for, gets the US label.
 */
export function resolveKeyCodeLabel(code: KeyCode, query?: LayoutQuery): string {
  if (!query || classifyKeyCode(code) !== 'WritingSystem') {
    return keyCodeLabel(code);
  }

  return queryLayout(query, code).pipe(
    Option.filter((glyph) => glyph.length > 0),
    Option.map(normalizeLayoutGlyph),
    Option.getOrElse(() => keyCodeLabel(code)),
  );
}
