import { readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';

/**
 * Make a location or site name safe for use as a path segment.
 */
export function sanitizeFilenamePart(value: string | null | undefined): string {
  const cleaned = (value ?? '')
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/[-\s]+/g, '-');
  return cleaned || 'unknown';
}

/**
 * `<dataDir>/<country>/<state>/<city>/<siteId>_<name>.csv`
 */
export function buildSiteCsvPath(
  dataDir: string,
  site: {
    siteId: number;
    name: string | null;
    country: string | null;
    state: string | null;
    city: string | null;
  },
): string {
  return join(
    dataDir,
    sanitizeFilenamePart(site.country),
    sanitizeFilenamePart(site.state),
    sanitizeFilenamePart(site.city),
    `${site.siteId}_${sanitizeFilenamePart(site.name)}.csv`,
  );
}

/**
 * First `<siteId>_*.csv` under dataDir (recursive), or null.
 */
export async function findSiteCsvFile(
  dataDir: string,
  siteId: number,
): Promise<string | null> {
  let entries: string[];
  try {
    entries = await readdir(dataDir, { recursive: true });
  } catch (error) {
    if (isMissingDirectory(error)) return null;
    throw error;
  }

  const prefix = `${siteId}_`;
  const match = entries
    .filter((entry) => {
      const name = basename(entry);
      return name.startsWith(prefix) && name.toLowerCase().endsWith('.csv');
    })
    .sort()[0];
  return match === undefined ? null : join(dataDir, match);
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
