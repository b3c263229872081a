/**
 * Marker backend
 * Runs `marker_single` into a scratch directory and loads its output back
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { z } from "zod";
import { RASTER_IMAGE_PATTERN, collectAssets } from "./assets";
import { torchDevice } from "../modules/prober";
import { fileExists } from "../utils/file-exists";
import { runCommand, type CommandRunner } from "../utils/run-command";
import { withScratchDir } from "../utils/scratch-dir";
import type {
  CommandBackendConfig,
  ConvertOptions,
  ConvertedDocument,
  Converter,
  DeviceClass,
} from "../types";

const MarkerMetaSchema = z.looseObject({
  page_stats: z.array(z.unknown()).optional(),
});

export interface MarkerOptions {
  settings: CommandBackendConfig;
  images: boolean;
  device: DeviceClass;
  run?: CommandRunner;
}

export class MarkerConverter implements Converter {
  readonly backend = "marker";

  constructor(private options: MarkerOptions) {}

  buildArgs(sourcePath: string, outputDir: string): string[] {
    const { images, settings } = this.options;
    const args = [
      sourcePath,
      "--output_dir",
      outputDir,
      "--output_format",
      "markdown",
    ];
    if (!images) args.push("--disable_image_extraction");
    return [...args, ...settings.args];
  }

  async convert(
    sourcePath: string,
    options: ConvertOptions = {},
  ): Promise<ConvertedDocument> {
    const { device, images, settings, run = runCommand } = this.options;
    const stem = path.parse(sourcePath).name;

    return withScratchDir(async (dir) => {
      await run(settings.executable, this.buildArgs(sourcePath, dir), {
        signal: options.signal,
        configKey: "backends.marker.executable",
        // marker picks its torch device from the environment
        env: { TORCH_DEVICE: torchDevice(device) },
      });

      // marker writes into <output_dir>/<stem>/
      const outputDir = path.join(dir, stem);
      const markdown = await readFile(
        path.join(outputDir, `${stem}.md`),
        "utf-8",
      );

      const document: ConvertedDocument = {
        markdown,
        pages: [],
        assets: images
          ? await collectAssets(outputDir, RASTER_IMAGE_PATTERN)
          : [],
      };

      const pageCount = await readPageCount(
        path.join(outputDir, `${stem}_meta.json`),
      );
      if (pageCount !== undefined) {
        document.pageCount = pageCount;
      }

      return document;
    });
  }
}

async function readPageCount(metaPath: string): Promise<number | undefined> {
  if (!(await fileExists(metaPath))) {
    return undefined;
  }

  const content = await readFile(metaPath, "utf-8");
  const { data } = MarkerMetaSchema.safeParse(JSON.parse(content));
  return data?.page_stats?.length;
}
