/**
 * LlamaParse backend
 * Uploads each document to the LlamaParse API, polls the job and fetches
 * the markdown and text results
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { isBlankText } from "../utils/is-blank-text";
import type {
  ConvertOptions,
  ConvertedDocument,
  Converter,
  LlamaParseConfig,
  ResultFormat,
} from "../types";

export const LLAMA_API_KEY_ENV = "LLAMA_CLOUD_API_KEY";

const JobSchema = z.object({
  id: z.string(),
  status: z.string(),
});

const MarkdownResultSchema = z.object({
  markdown: z.string(),
  job_metadata: z
    .looseObject({ job_pages: z.number().int().nonnegative().optional() })
    .optional(),
});

const TextResultSchema = z.object({
  text: z.string(),
});

const JsonResultSchema = z.object({
  pages: z.array(
    z.looseObject({
      page: z.number().int(),
      text: z.string().optional(),
    }),
  ),
});

const FAILED_STATUSES = new Set(["ERROR", "CANCELED", "CANCELLED"]);

export interface LlamaParseOptions {
  apiKey: string;
  settings: LlamaParseConfig;
  format: ResultFormat;
  language: string;
  fetch?: typeof fetch;
}

export class LlamaParseConverter implements Converter {
  readonly backend = "llamaparse";

  constructor(private options: LlamaParseOptions) {}

  async convert(
    sourcePath: string,
    options: ConvertOptions = {},
  ): Promise<ConvertedDocument> {
    const { format } = this.options;
    const { signal } = options;

    const job = await this.upload(sourcePath, signal);
    await this.waitForJob(job.id, signal);

    const document: ConvertedDocument = { pages: [], assets: [] };
    const resultPath = `/api/parsing/job/${encodeURIComponent(job.id)}/result`;

    if (format !== "text") {
      const result = await this.request(
        `${resultPath}/markdown`,
        MarkdownResultSchema,
        { signal },
      );
      document.markdown = result.markdown;
      document.pageCount = result.job_metadata?.job_pages;
    }

    if (format !== "markdown") {
      const result = await this.request(`${resultPath}/text`, TextResultSchema, {
        signal,
      });
      document.text = result.text;

      // Whole-document text can come back empty; keep the pages to fall back on
      if (isBlankText(result.text)) {
        const json = await this.request(`${resultPath}/json`, JsonResultSchema, {
          signal,
        });
        document.pages = json.pages.map((page) => ({
          page: page.page,
          text: page.text ?? "",
        }));
      }
    }

    return document;
  }

  private async upload(
    sourcePath: string,
    signal?: AbortSignal,
  ): Promise<z.infer<typeof JobSchema>> {
    const { settings, language } = this.options;
    const data = await readFile(sourcePath, { signal });

    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(data)]), path.basename(sourcePath));
    form.append("language", language);
    form.append("parse_mode", settings.parseMode);

    return this.request("/api/parsing/upload", JobSchema, {
      method: "POST",
      body: form,
      signal,
    });
  }

  private async waitForJob(id: string, signal?: AbortSignal): Promise<void> {
    const jobPath = `/api/parsing/job/${encodeURIComponent(id)}`;

    for (;;) {
      const job = await this.request(jobPath, JobSchema, { signal });
      if (job.status === "SUCCESS") {
        return;
      }
      if (FAILED_STATUSES.has(job.status)) {
        throw new Error(`LlamaParse job ${id} ended with status ${job.status}`);
      }
      await sleep(this.options.settings.pollInterval, undefined, { signal });
    }
  }

  private async request<T>(
    apiPath: string,
    schema: z.ZodType<T>,
    init: RequestInit = {},
  ): Promise<T> {
    const fetchImpl = this.options.fetch ?? fetch;
    const url = new URL(apiPath, this.options.settings.baseUrl);

    const response = await fetchImpl(url, {
      ...init,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        Accept: "application/json",
      },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return schema.parse(await response.json());
  }
}
