import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest';
import { runCli } from '../../src/cli';

describe('runCli', () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.stubEnv('KEYGLYPH_VERSION', '1.2.3');
    vi.stubEnv('KEYGLYPH_LAYOUT_FILE', '');
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  test('describes keys under a bundled layout', async () => {
    const code = await runCli(['describe', 'KeyA', 'Minus', 'F5', '--layout', 'fr']);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      ['KeyA\tWritingSystem\tA\tQ', 'Minus\tWritingSystem\t-\t)', 'F5\tFunction\tF5\tF5'].join('\n')
    );
  });

  test('resolves aliases to canonical names', async () => {
    const code = await runCli(['describe', 'OSLeft', 'q', 'Q', '--layout=none']);

    expect(code).toBe(4);
    expect(error).toHaveBeenCalledWith('Unknown key: q');
    expect(log).toHaveBeenCalledWith(
      ['MetaLeft\tFunctional\t⌘ Left\t⌘ Left', 'KeyQ\tWritingSystem\tQ\tQ'].join('\n')
    );
  });

  test('prints JSON', async () => {
    const code = await runCli(['describe', 'Minus', '--layout', 'de', '--json']);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(
      JSON.stringify([{ name: 'Minus', keyClass: 'WritingSystem', label: '-', resolvedLabel: 'ß' }])
    );
  });

  test('lists one class', async () => {
    const code = await runCli(['list', '--class', 'ArrowPad', '--layout', 'none']);

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(
      [
        'ArrowDown\tArrowPad\t↓\t↓',
        'ArrowLeft\tArrowPad\t←\t←',
        'ArrowRight\tArrowPad\t→\t→',
        'ArrowUp\tArrowPad\t↑\t↑',
      ].join('\n')
    );
  });

  test('returns 2 on usage errors', async () => {
    const code = await runCli(['describe']);

    expect(code).toBe(2);
    expect(error).toHaveBeenCalledWith('Missing key name.');
    expect(log).not.toHaveBeenCalled();
  });

  test('prints the version', async () => {
    expect(await runCli(['--version'])).toBe(0);
    expect(log).toHaveBeenCalledWith('1.2.3');
  });

  test('prints help with the version', async () => {
    expect(await runCli([])).toBe(0);
    expect(String(log.mock.calls[0][0]).split('\n')[0]).toBe('keyglyph v1.2.3');
  });
});
