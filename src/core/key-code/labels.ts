import type { KeyCode } from './codes';
import usLabels from './labels.json';

/** Display labels for the US reference layout. */
export const KEY_CODE_LABELS: { readonly [K in KeyCode]: string } = usLabels;
