/**
 * Canonical physical key names, partitioned by key class.
 *
 * Names follow the W3C UI Events `KeyboardEvent.code` vocabulary, extended with
 * gamepad buttons and a handful of codes only one browser engine emits. The
 * partition is explicit: modifiers are `Functional` even though they sit in the
 * main key block. Listing order is the canonical enumeration order.
 */

import { KEY_CODE_CLASSES, type KeyCodeClass } from './types';

export const KEY_CODES_BY_CLASS = {
  WritingSystem: [
    'Backquote',
    'Backslash',
    'Backspace',
    'BracketLeft',
    'BracketRight',
    'Comma',
    'Digit0',
    'Digit1',
    'Digit2',
    'Digit3',
    'Digit4',
    'Digit5',
    'Digit6',
    'Digit7',
    'Digit8',
    'Digit9',
    'Equal',
    'IntlBackslash',
    'IntlRo',
    'IntlYen',
    'KeyA',
    'KeyB',
    'KeyC',
    'KeyD',
    'KeyE',
    'KeyF',
    'KeyG',
    'KeyH',
    'KeyI',
    'KeyJ',
    'KeyK',
    'KeyL',
    'KeyM',
    'KeyN',
    'KeyO',
    'KeyP',
    'KeyQ',
    'KeyR',
    'KeyS',
    'KeyT',
    'KeyU',
    'KeyV',
    'KeyW',
    'KeyX',
    'KeyY',
    'KeyZ',
    'Minus',
    'Period',
    'Quote',
    'Semicolon',
    'Slash',
  ],
  Functional: [
    'AltLeft',
    'AltRight',
    'CapsLock',
    'ContextMenu',
    'ControlLeft',
    'ControlRight',
    'Enter',
    'MetaLeft',
    'MetaRight',
    'ShiftLeft',
    'ShiftRight',
    'Space',
    'Tab',
    // Japanese and Korean keyboards
    'Convert',
    'KanaMode',
    'Lang1',
    'Lang2',
    'Lang3',
    'Lang4',
    'Lang5',
    'NonConvert',
  ],
  ControlPad: [
    'Delete',
    'End',
    'Help',
    'Home',
    'Insert',
    'PageDown',
    'PageUp',
  ],
  ArrowPad: [
    'ArrowDown',
    'ArrowLeft',
    'ArrowRight',
    'ArrowUp',
  ],
  Numpad: [
    'NumLock',
    'Numpad0',
    'Numpad1',
    'Numpad2',
    'Numpad3',
    'Numpad4',
    'Numpad5',
    'Numpad6',
    'Numpad7',
    'Numpad8',
    'Numpad9',
    'NumpadAdd',
    'NumpadBackspace',
    'NumpadClear',
    'NumpadClearEntry',
    'NumpadComma',
    'NumpadDecimal',
    'NumpadDivide',
    'NumpadEnter',
    'NumpadEqual',
    'NumpadHash',
    'NumpadMemoryAdd',
    'NumpadMemoryClear',
    'NumpadMemoryRecall',
    'NumpadMemoryStore',
    'NumpadMemorySubtract',
    'NumpadMultiply',
    'NumpadParenLeft',
    'NumpadParenRight',
    'NumpadStar',
    'NumpadSubtract',
  ],
  Function: [
    'Escape',
    'F1',
    'F2',
    'F3',
    'F4',
    'F5',
    'F6',
    'F7',
    'F8',
    'F9',
    'F10',
    'F11',
    'F12',
    'F13',
    'F14',
    'F15',
    'F16',
    'F17',
    'F18',
    'F19',
    'F20',
    'F21',
    'F22',
    'F23',
    'F24',
    'Fn',
    'FnLock',
    'PrintScreen',
    'ScrollLock',
    'Pause',
  ],
  Media: [
    'BrowserBack',
    'BrowserFavorites',
    'BrowserForward',
    'BrowserHome',
    'BrowserRefresh',
    'BrowserSearch',
    'BrowserStop',
    'Eject',
    'LaunchApp1',
    'LaunchApp2',
    'LaunchMail',
    'MediaPlayPause',
    'MediaSelect',
    'MediaStop',
    'MediaTrackNext',
    'MediaTrackPrevious',
    'Power',
    'Sleep',
    'AudioVolumeDown',
    'AudioVolumeMute',
    'AudioVolumeUp',
    'WakeUp',
  ],
  Legacy: [
    'Again',
    'Copy',
    'Cut',
    'Find',
    'Open',
    'Paste',
    'Props',
    'Select',
    'Undo',
  ],
  Gamepad: [
    'Gamepad0',
    'Gamepad1',
    'Gamepad2',
    'Gamepad3',
    'Gamepad4',
    'Gamepad5',
    'Gamepad6',
    'Gamepad7',
    'Gamepad8',
    'Gamepad9',
    'Gamepad10',
    'Gamepad11',
    'Gamepad12',
    'Gamepad13',
    'Gamepad14',
    'Gamepad15',
    'Gamepad16',
    'Gamepad17',
    'Gamepad18',
    'Gamepad19',
  ],
  NonStandard: [
    'BrightnessDown',
    'BrightnessUp',
    'DisplayToggleIntExt',
    'KeyboardLayoutSelect',
    'LaunchAssistant',
    'LaunchControlPanel',
    'LaunchScreenSaver',
    'MailForward',
    'MailReply',
    'MailSend',
    'MediaFastForward',
    'MediaPause',
    'MediaPlay',
    'MediaRecord',
    'MediaRewind',
    'PrivacyScreenToggle',
    'SelectTask',
    'ShowAllWindows',
    'ZoomToggle',
  ],
} as const satisfies { readonly [C in KeyCodeClass]: readonly string[] };

export type KeyCode = (typeof KEY_CODES_BY_CLASS)[KeyCodeClass][number];

export const KEY_CODES: readonly KeyCode[] = KEY_CODE_CLASSES.flatMap(
  (keyClass): readonly KeyCode[] => KEY_CODES_BY_CLASS[keyClass],
);

const KEY_CODE_SET: ReadonlySet<string> = new Set(KEY_CODES);

export function isKeyCode(value: unknown): value is KeyCode {
  return typeof value === 'string' && KEY_CODE_SET.has(value);
}
