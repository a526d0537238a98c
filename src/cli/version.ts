import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json, which sits two levels above both src/cli and dist/cli
 */
export function readVersion(): string {
  const packageJsonUrl = new URL('../../package.json', import.meta.url);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(packageJsonUrl, 'utf-8'));
  } catch {
    return '0.0.0';
  }
  const result = PackageJsonSchema.safeParse(parsed);
  return result.success ? result.data.version : '0.0.0';
}
