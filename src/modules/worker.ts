/**
 * Conversion Worker
 * Converts one WorkItem and writes its artifacts. Never rejects: every
 * failure comes back as a Failure outcome so one bad document cannot
 * abort the batch.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import {
  EncodingError,
  ItemConversionError,
  describeError,
} from "../errors";
import { IMAGE_MARKER, encodeImagePaths } from "../utils/encode-image-paths";
import { isBlankText } from "../utils/is-blank-text";
import type { Logger } from "../utils/logger";
import { MAX_TIMEOUT_MS } from "../types";
import type {
  ConvertedDocument,
  ConverterFactory,
  DeviceClass,
  ConversionOutcome,
  ConversionSuccess,
  FailureReason,
  ResultFormat,
  WorkItem,
} from "../types";

export interface WorkerOptions {
  createConverter: ConverterFactory;
  device: DeviceClass;
  format: ResultFormat;
  metadata: boolean;
  timeout: number; // ms, 0 = none
  logger?: Logger;
}

interface WrittenArtifacts {
  artifactPaths: string[];
  assetCount: number;
  textLength: number;
}

export async function convertItem(
  item: WorkItem,
  options: WorkerOptions,
): Promise<ConversionOutcome> {
  let startedAt = performance.now();
  const elapsed = (): number =>
    Math.max(0, (performance.now() - startedAt) / 1000);

  const controller = new AbortController();
  const timer =
    options.timeout > 0
      ? setTimeout(
          () => controller.abort(),
          Math.min(options.timeout, MAX_TIMEOUT_MS),
        )
      : undefined;

  let stage: "convert" | "write" = "convert";

  try {
    const converter = options.createConverter(options.device);

    startedAt = performance.now();
    const document = await untilAborted(
      converter.convert(item.sourcePath, { signal: controller.signal }),
      controller.signal,
    );

    stage = "write";
    const written = await writeArtifacts(item, document, options);

    if (options.metadata) {
      const metaPath = path.join(itemDir(item), `${item.stem}_meta.json`);
      await writeFile(
        metaPath,
        JSON.stringify(
          {
            name: item.stem,
            backend: converter.backend,
            processingTimeSeconds: elapsed(),
            pageCount: document.pageCount ?? null,
            textLength: written.textLength,
            assetCount: written.assetCount,
          },
          null,
          2,
        ),
        "utf-8",
      );
      written.artifactPaths.push(metaPath);
    }

    const outcome: ConversionSuccess = {
      status: "success",
      artifactPaths: written.artifactPaths,
      assetCount: written.assetCount,
      elapsedSeconds: elapsed(),
    };
    if (document.pageCount !== undefined) {
      outcome.pageCount = document.pageCount;
    }
    return outcome;
  } catch (error) {
    const reason: FailureReason = controller.signal.aborted
      ? "timeout"
      : `${stage}-error`;
    const errorMessage =
      reason === "timeout"
        ? `Timed out after ${options.timeout}ms`
        : describeError(error);

    if (error instanceof EncodingError) {
      options.logger?.error(`Internal encoder defect on ${item.name}`, error);
    } else {
      options.logger?.debug(`${item.name}: ${reason}: ${errorMessage}`);
    }

    return {
      status: "failure",
      reason,
      errorMessage,
      elapsedSeconds: elapsed(),
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 * A converter that ignores its signal still frees the slot on timeout;
 * whatever it settles with afterwards is dropped.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function itemDir(item: WorkItem): string {
  return path.join(item.destinationDir, item.stem);
}

async function writeArtifacts(
  item: WorkItem,
  document: ConvertedDocument,
  options: WorkerOptions,
): Promise<WrittenArtifacts> {
  const dir = itemDir(item);
  await mkdir(dir, { recursive: true });

  const artifactPaths: string[] = [];
  let textLength = 0;

  for (const asset of document.assets) {
    const target = resolveInside(dir, asset.path);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, asset.data);
  }

  if (options.format !== "text") {
    if (document.markdown === undefined) {
      throw new ItemConversionError("Backend produced no markdown");
    }
    const markdown = document.markdown.includes(IMAGE_MARKER)
      ? encodeMarkdown(document.markdown)
      : document.markdown;

    const markdownPath = path.join(dir, `${item.stem}.md`);
    await writeFile(markdownPath, markdown, "utf-8");
    artifactPaths.push(markdownPath);
    textLength = markdown.length;
  }

  if (options.format !== "markdown") {
    const text = resolveText(document);
    if (text !== undefined) {
      const textPath = path.join(dir, `${item.stem}.txt`);
      await writeFile(textPath, text, "utf-8");
      artifactPaths.push(textPath);
      textLength = textLength || text.length;
    }
  }

  if (artifactPaths.length === 0) {
    throw new ItemConversionError("Backend produced no text content");
  }

  return { artifactPaths, assetCount: document.assets.length, textLength };
}

/**
 * Plain text of the document, falling back to per-page text when the
 * whole-document serialization is blank
 */
export function resolveText(document: ConvertedDocument): string | undefined {
  if (document.text !== undefined && !isBlankText(document.text)) {
    return document.text;
  }

  const pages = document.pages
    .map((page) => page.text.trim())
    .filter((text) => text.length > 0);

  return pages.length > 0 ? pages.join("\n\n") : undefined;
}

function encodeMarkdown(markdown: string): string {
  try {
    return encodeImagePaths(markdown);
  } catch (error) {
    throw new EncodingError(describeError(error), { cause: error });
  }
}

function resolveInside(dir: string, relativePath: string): string {
  const base = path.resolve(dir);
  const target = path.resolve(base, relativePath);
  if (!target.startsWith(base + path.sep)) {
    throw new ItemConversionError(
      `Asset path escapes the output directory: ${relativePath}`,
    );
  }
  return target;
}
