import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageVersion = z.object({ version: z.string() });

function readVersion(relative: string): string | undefined {
  try {
    const pkgPath = new URL(relative, import.meta.url);
    const parsed = PackageVersion.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8')));
    return parsed.success ? parsed.data.version : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Used by /healthz and the CLI's --version.
 *
 * Resolved relative to this file, so it works both from src/ under tsx and
 * from dist/src/ after a build (one more level up).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ?? readVersion('../package.json') ?? readVersion('../../package.json') ?? '0.0.0';
