/**
 * Package version, read once from package.json
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageSchema = z.object({ version: z.string() });

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  // src/shared/ and dist/shared/ both sit two levels below the package root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(thisDir, '..', '..', 'package.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  } catch {
    return FALLBACK_VERSION;
  }
  const parsed = PackageSchema.safeParse(raw);
  cachedVersion = parsed.success ? parsed.data.version : FALLBACK_VERSION;
  return cachedVersion;
}
