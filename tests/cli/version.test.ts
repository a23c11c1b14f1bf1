import { afterEach, describe, expect, test, vi } from 'vitest';
import { getCliVersion } from '../../src/cli/version';

describe('getCliVersion', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('prefers KEYGLYPH_VERSION', async () => {
    vi.stubEnv('KEYGLYPH_VERSION', ' 9.9.9 ');
    expect(await getCliVersion()).toBe('9.9.9');
  });

  test('reads the package manifest', async () => {
    vi.stubEnv('KEYGLYPH_VERSION', '');
    expect(await getCliVersion()).toBe('0.1.0');
  });
});
