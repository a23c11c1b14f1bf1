import { readFile } from 'node:fs/promises';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

async function readPackageVersion(): Promise<string | null> {
  try {
    const pkg: { version?: unknown } = JSON.parse(await readFile(PACKAGE_JSON_URL, 'utf8'));
    return typeof pkg.version === 'string' ? pkg.version : null;
  } catch {
    // src/ was copied somewhere without the package manifest.
    return null;
  }
}

/** `KEYGLYPH_VERSION` wins so packaged builds can stamp their own version. */
export async function getCliVersion(): Promise<string> {
  const fromEnv = process.env.KEYGLYPH_VERSION?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  return (await readPackageVersion()) ?? 'unknown';
}
