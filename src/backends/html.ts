/**
 * HTML backend
 * Converts saved web pages in-process with cheerio and turndown.
 * Local images are copied into `<stem>_artifacts/` and relinked.
 */

import { load, type CheerioAPI } from "cheerio";
import { readFile } from "fs/promises";
import path from "node:path";
import { createTurndownService } from "../turndown";
import { fileExists } from "../utils/file-exists";
import { isImageUrl } from "../utils/is-image-url";
import { encodeImagePath } from "../utils/encode-image-paths";
import type {
  ConvertOptions,
  ConvertedDocument,
  Converter,
  DocumentAsset,
} from "../types";

const REMOVE_SELECTORS = "script, style, noscript, template";
const BLOCK_SELECTORS =
  "p, div, section, article, header, footer, blockquote, pre, li, tr, h1, h2, h3, h4, h5, h6";

export interface HtmlOptions {
  images: boolean;
}

export class HtmlConverter implements Converter {
  readonly backend = "html";

  constructor(private options: HtmlOptions) {}

  async convert(
    sourcePath: string,
    options: ConvertOptions = {},
  ): Promise<ConvertedDocument> {
    const html = await readFile(sourcePath, {
      encoding: "utf-8",
      signal: options.signal,
    });
    const $ = load(html);
    $(REMOVE_SELECTORS).remove();

    const stem = path.parse(sourcePath).name;
    const imageMapping = new Map<string, string>();
    const assets = this.options.images
      ? await copyLocalImages($, sourcePath, `${stem}_artifacts`, imageMapping)
      : [];

    options.signal?.throwIfAborted();

    const content: ReturnType<CheerioAPI> =
      $("body").length > 0 ? $("body") : $.root();
    const markdown = createTurndownService(imageMapping).turndown(
      content.html() ?? "",
    );

    return {
      markdown: `${markdown}\n`,
      text: extractText($),
      pages: [],
      assets,
    };
  }
}

/**
 * Read every local image once and map its `src` to the asset path
 */
async function copyLocalImages(
  $: CheerioAPI,
  sourcePath: string,
  artifactsDir: string,
  imageMapping: Map<string, string>,
): Promise<DocumentAsset[]> {
  const assets: DocumentAsset[] = [];
  const usedNames = new Set<string>();
  const sources = $("img")
    .toArray()
    .map((el) => $(el).attr("src"))
    .filter((src): src is string => src !== undefined);

  for (const src of sources) {
    if (imageMapping.has(src) || !isLocalImage(src)) continue;

    const localPath = path.resolve(path.dirname(sourcePath), decodeSrc(src));
    if (!(await fileExists(localPath))) continue;

    const name = uniqueName(path.basename(localPath), usedNames);
    const assetPath = `${artifactsDir}/${name}`;
    assets.push({ path: assetPath, data: await readFile(localPath) });
    // Links are encoded whatever their alt text; the file keeps its name
    imageMapping.set(src, encodeImagePath(assetPath));
  }

  return assets;
}

function isLocalImage(src: string): boolean {
  // Skip anything with a scheme (http:, data:, file:) or protocol-relative
  if (/^[a-z][a-z0-9+.-]*:/i.test(src) || src.startsWith("//")) {
    return false;
  }
  return isImageUrl(src);
}

function decodeSrc(src: string): string {
  const clean = src.split(/[?#]/, 1)[0] ?? src;
  try {
    return decodeURIComponent(clean);
  } catch {
    return clean;
  }
}

function uniqueName(name: string, used: Set<string>): string {
  const { name: base, ext } = path.parse(name);
  let candidate = name;
  for (let n = 1; used.has(candidate); n++) {
    candidate = `${base}-${n}${ext}`;
  }
  used.add(candidate);
  return candidate;
}

/**
 * Plain text with one line per block element and no blank runs
 */
function extractText($: CheerioAPI): string {
  $("br").replaceWith("\n");
  $(BLOCK_SELECTORS).append("\n");

  const root: ReturnType<CheerioAPI> =
    $("body").length > 0 ? $("body") : $.root();
  return root
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
