/**
 * Physical key identities, classes, and display labels.
 */
export {
  KEY_CODES,
  KEY_CODES_BY_CLASS,
  KEY_CODE_ALIASES,
  KEY_CODE_CLASSES,
  LEGACY_KEY_ALIASES,
  classifyKeyCode,
  isKeyCode,
  keyCodeLabel,
  keyCodeName,
  keyCodesInClass,
  normalizeLayoutGlyph,
  parseKeyCode,
  resolveKeyCodeLabel,
} from './core/key-code';
export type { KeyCode, KeyCodeClass, LayoutQuery } from './core/key-code';

export { BUNDLED_LAYOUTS, LAYOUT_IDS } from './layouts';
export type { BundledLayoutId, LayoutId, LayoutTable } from './layouts';

export { AppConfig } from './effect/Config';
export type { AppConfigShape } from './effect/Config';
export { FileReadError, KeyboardLayoutError, UnknownKeyCodeError } from './effect/errors';
export { RunMetadata, RunVariable } from './effect/models';
export { AppLayer, TestAppLayer, makeAppLayer, runEffect } from './effect/runtime';
export type { AppLayerOptions, AppServices } from './effect/runtime';
export { FileSystem, KeyLabels, KeyboardLayout } from './effect/services';
export type { KeyDescription } from './effect/services';
export {
  KeyCode as KeyCodeSchema,
  KeyCodeClass as KeyCodeClassSchema,
  KeyCodeFromString,
  decodeKeyCode,
} from './effect/types';
