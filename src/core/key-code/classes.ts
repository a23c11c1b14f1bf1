import { KEY_CODES_BY_CLASS, type KeyCode } from './codes';
import { KEY_CODE_CLASSES, type KeyCodeClass } from './types';

function buildClassTable(): ReadonlyMap<KeyCode, KeyCodeClass> {
  const table = new Map<KeyCode, KeyCodeClass>();
  for (const keyClass of KEY_CODE_CLASSES) {
    for (const code of KEY_CODES_BY_CLASS[keyClass]) {
      const existing = table.get(code);
      if (existing) {
        throw new Error(`Key code ${code} is listed under both ${existing} and ${keyClass}`);
      }
      table.set(code, keyClass);
    }
  }
  return table;
}

export const KEY_CODE_CLASS: ReadonlyMap<KeyCode, KeyCodeClass> = buildClassTable();
