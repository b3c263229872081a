/**
 * Docling backend
 * Runs the `docling` CLI into a scratch directory and loads its output back
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { collectAssets } from "./assets";
import { torchDevice } from "../modules/prober";
import { runCommand, type CommandRunner } from "../utils/run-command";
import { withScratchDir } from "../utils/scratch-dir";
import type {
  CommandBackendConfig,
  ConvertOptions,
  ConvertedDocument,
  Converter,
  DeviceClass,
  ResultFormat,
} from "../types";

export interface DoclingOptions {
  settings: CommandBackendConfig;
  format: ResultFormat;
  images: boolean;
  language: string;
  device: DeviceClass;
  run?: CommandRunner;
}

export class DoclingConverter implements Converter {
  readonly backend = "docling";

  constructor(private options: DoclingOptions) {}

  buildArgs(sourcePath: string, outputDir: string): string[] {
    const { device, format, images, language, settings } = this.options;
    const args = [
      sourcePath,
      "--output",
      outputDir,
      "--image-export-mode",
      images ? "referenced" : "placeholder",
      "--device",
      torchDevice(device),
    ];

    if (format !== "text") args.push("--to", "md");
    if (format !== "markdown") args.push("--to", "text");
    if (language) args.push("--ocr-lang", language);

    return [...args, ...settings.args];
  }

  async convert(
    sourcePath: string,
    options: ConvertOptions = {},
  ): Promise<ConvertedDocument> {
    const { format, images, settings, run = runCommand } = this.options;
    const stem = path.parse(sourcePath).name;

    return withScratchDir(async (dir) => {
      await run(settings.executable, this.buildArgs(sourcePath, dir), {
        signal: options.signal,
        configKey: "backends.docling.executable",
      });

      const document: ConvertedDocument = { pages: [], assets: [] };

      if (format !== "text") {
        const markdown = await readFile(path.join(dir, `${stem}.md`), "utf-8");
        document.markdown = relativizeLinks(markdown, dir);
      }
      if (format !== "markdown") {
        document.text = await readFile(path.join(dir, `${stem}.txt`), "utf-8");
      }
      if (images) {
        const artifactsDir = `${stem}_artifacts`;
        document.assets = await collectAssets(
          path.join(dir, artifactsDir),
          "**/*",
          artifactsDir,
        );
      }

      return document;
    });
  }
}

// Image links may point into the scratch directory by absolute path
function relativizeLinks(markdown: string, dir: string): string {
  return markdown
    .split(`${dir}${path.sep}`)
    .join("")
    .split(`${dir}/`)
    .join("");
}
