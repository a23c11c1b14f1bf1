/**
 * Keyboard layout tables shipped with the package.
 *
 * Each table maps a canonical key name to the unshifted glyph that key types
 * under the layout. Only writing system keys are listed.
 */
import de from './de.json';
import fr from './fr.json';
import us from './us.json';

export type LayoutTable = Readonly<Record<string, string>>;

export const BUNDLED_LAYOUTS = {
  us,
  de,
  fr,
} satisfies Record<string, LayoutTable>;

export type BundledLayoutId = keyof typeof BUNDLED_LAYOUTS;

/** `none` disables layout lookups entirely. */
export const LAYOUT_IDS = ['none', 'us', 'de', 'fr'] as const satisfies ReadonlyArray<BundledLayoutId | 'none'>;

export type LayoutId = (typeof LAYOUT_IDS)[number];
