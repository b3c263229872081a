/**
 * Scanner Module
 * Discovers input documents and builds one WorkItem per file
 */

import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import { DiscoveryError } from "../errors";
import type { WorkItem } from "../types";

/**
 * Scans the input directory (flat, non-recursive) for documents whose
 * extension the backend accepts. Matching is case-insensitive and the
 * result is sorted by file name.
 *
 * An empty result is not an error: the caller reports "no work".
 *
 * @throws DiscoveryError when the input directory is missing or not a directory
 */
export async function scan(
  inputDir: string,
  outputDir: string,
  extensions: readonly string[],
): Promise<WorkItem[]> {
  const root = path.resolve(inputDir);
  await assertDirectory(root);

  const patterns = extensions.map((ext) => `*${normalizeExtension(ext)}`);
  const sourcePaths = await glob(patterns, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    deep: 1,
    caseSensitiveMatch: false,
  });

  const destinationDir = path.resolve(outputDir);
  const sorted = sourcePaths.sort((a, b) =>
    path.basename(a).localeCompare(path.basename(b)),
  );
  const stems = assignStems(sorted.map((sourcePath) => path.parse(sourcePath).name));

  return sorted.map((sourcePath, index) =>
    Object.freeze({
      name: path.basename(sourcePath),
      stem: stems[index] ?? path.parse(sourcePath).name,
      sourcePath: path.normalize(sourcePath),
      destinationDir,
    }),
  );
}

/**
 * Give every item its own output directory name
 *
 * Files sharing a stem (`a.pdf` and `a.PDF`, `page.html` and `page.htm`)
 * keep it for the first and get `-1`, `-2`... for the rest. Comparison
 * ignores case so the directories stay distinct on case-insensitive disks.
 */
function assignStems(stems: readonly string[]): string[] {
  const natural = new Set(stems.map((stem) => stem.toLowerCase()));
  const taken = new Set<string>();

  return stems.map((stem) => {
    let candidate = stem;
    // Suffixed names also avoid stems other files already own
    for (
      let n = 1;
      taken.has(candidate.toLowerCase()) ||
      (candidate !== stem && natural.has(candidate.toLowerCase()));
      n++
    ) {
      candidate = `${stem}-${n}`;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}

async function assertDirectory(dir: string): Promise<void> {
  try {
    const stats = await stat(dir);
    if (!stats.isDirectory()) {
      throw new DiscoveryError(dir, `Input path is not a directory: ${dir}`);
    }
  } catch (error) {
    if (error instanceof DiscoveryError) {
      throw error;
    }
    throw new DiscoveryError(dir, `Input directory not found: ${dir}`, {
      cause: error,
    });
  }
}

function normalizeExtension(ext: string): string {
  return ext.startsWith(".") ? ext : `.${ext}`;
}
