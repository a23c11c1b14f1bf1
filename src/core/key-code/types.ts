/**
 * Shared key code types.
 */

import type { Option } from 'effect';
import type { KeyCode } from './codes';

export type { KeyCode } from './codes';

export const KEY_CODE_CLASSES = [
  'WritingSystem',
  'Functional',
  'ControlPad',
  'ArrowPad',
  'Numpad',
  'Function',
  'Media',
  'Legacy',
  'Gamepad',
  'NonStandard',
] as const;

export type KeyCodeClass = (typeof KEY_CODE_CLASSES)[number];

/**
 * Reports the glyph a physical key produces under the active keyboard layout.
 *
 * Implementations may be bound to a UI thread or be non-reentrant; callers
 * invoke it at most once per resolution and never cache its answer.
 */
export type LayoutQuery = (code: KeyCode) => Option.Option<string>;
