import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { optimize } from './optimize';
import logger from './logger';
import { OutputFileNames } from './types';

export interface BlocklistVariants {
  plain: string[];
  plainWithoutShortlinks: string[];
  optimized: string[];
  optimizedWithoutShortlinks: string[];
}

export const DEFAULT_FILE_NAMES: OutputFileNames = {
  plain: 'toblock.lst',
  plainWithoutShortlinks: 'toblock-without-shorturl.lst',
  optimized: 'toblock-optimized.lst',
  optimizedWithoutShortlinks: 'toblock-without-shorturl-optimized.lst',
};

const VARIANT_KEYS = [
  'plain',
  'plainWithoutShortlinks',
  'optimized',
  'optimizedWithoutShortlinks',
] as const satisfies ReadonlyArray<keyof OutputFileNames>;

function sorted(domains: Iterable<string>): string[] {
  return Array.from(domains).sort();
}

/**
 * Derive the four output lists. Shortlink domains are removed from the set
 * first (so they never take part in optimization) and then appended back to
 * the two "with shortlinks" variants.
 */
export function buildVariants(finalDomains: ReadonlySet<string>, shortlinks: readonly string[]): BlocklistVariants {
  const shortSet = new Set(shortlinks);
  const base = new Set<string>();
  for (const d of finalDomains) {
    if (!shortSet.has(d)) base.add(d);
  }
  const optimized = optimize(base);

  return {
    plain: sorted([...base, ...shortSet]),
    plainWithoutShortlinks: sorted(base),
    optimized: sorted([...optimized, ...shortSet]),
    optimizedWithoutShortlinks: sorted(optimized),
  };
}

export interface WriteResult {
  file: string;
  count: number;
  ok: boolean;
}

/**
 * Write each variant newline-joined, replacing any existing file. A failed
 * write is logged and reported; the remaining files are still written.
 */
export async function writeBlocklists(
  variants: BlocklistVariants,
  outDir: string,
  fileNames: OutputFileNames = DEFAULT_FILE_NAMES,
): Promise<WriteResult[]> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (err) {
    logger.error({ err, outDir }, 'failed to create output directory');
  }

  const results: WriteResult[] = [];
  for (const key of VARIANT_KEYS) {
    const file = path.join(outDir, fileNames[key]);
    const lines = variants[key];
    try {
      await writeFile(file, lines.join('\n'), { encoding: 'utf8', flag: 'w' });
      logger.info({ file, count: lines.length }, 'blocklist written');
      results.push({ file, count: lines.length, ok: true });
    } catch (err) {
      logger.error({ err, file }, 'failed to write blocklist');
      results.push({ file, count: lines.length, ok: false });
    }
  }
  return results;
}
