import glob from "fast-glob";
import { readFile } from "fs/promises";
import path from "node:path";
import type { DocumentAsset } from "../types";

export const RASTER_IMAGE_PATTERN = "**/*.{png,jpg,jpeg,gif,webp,bmp,tif,tiff}";

/**
 * Load files under `root` as document assets
 * Asset paths are `prefix/<path relative to root>`, "/"-separated
 */
export async function collectAssets(
  root: string,
  patterns: string | string[],
  prefix = "",
): Promise<DocumentAsset[]> {
  const files = await glob(patterns, {
    cwd: root,
    onlyFiles: true,
    caseSensitiveMatch: false,
  });

  return Promise.all(
    files.sort().map(async (file) => ({
      path: prefix ? `${prefix}/${file}` : file,
      data: await readFile(path.join(root, file)),
    })),
  );
}
