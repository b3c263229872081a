/**
 * Backend registry
 * Validates a backend's prerequisites once, then hands out a factory that
 * builds a fresh converter for every item
 */

import { ConfigurationError } from "../errors";
import { DoclingConverter } from "./docling";
import { HtmlConverter } from "./html";
import { LLAMA_API_KEY_ENV, LlamaParseConverter } from "./llamaparse";
import { MarkerConverter } from "./marker";
import type {
  BackendName,
  ConversionConfig,
  ConverterFactory,
  ResultFormat,
} from "../types";

type TextFormat = Exclude<ResultFormat, "both">;

interface Backend {
  extensions: readonly string[];
  formats: readonly TextFormat[];
  prepare(config: ConversionConfig, env: NodeJS.ProcessEnv): ConverterFactory;
}

const BACKENDS: Record<BackendName, Backend> = {
  docling: {
    extensions: [".pdf"],
    formats: ["markdown", "text"],
    prepare: ({ converter, backends }) => (device) =>
      new DoclingConverter({
        settings: backends.docling,
        format: converter.format,
        images: converter.images,
        language: converter.language,
        device,
      }),
  },
  marker: {
    extensions: [".pdf"],
    formats: ["markdown"],
    prepare: ({ converter, backends }) => (device) =>
      new MarkerConverter({
        settings: backends.marker,
        images: converter.images,
        device,
      }),
  },
  llamaparse: {
    extensions: [".pdf"],
    formats: ["markdown", "text"],
    prepare: ({ converter, backends }, env) => {
      const apiKey = env[LLAMA_API_KEY_ENV];
      if (!apiKey) {
        throw new ConfigurationError(
          `${LLAMA_API_KEY_ENV} is not set. Export it or add it to a .env file.`,
        );
      }
      return () =>
        new LlamaParseConverter({
          apiKey,
          settings: backends.llamaparse,
          format: converter.format,
          language: converter.language,
        });
    },
  },
  html: {
    extensions: [".html", ".htm"],
    formats: ["markdown", "text"],
    prepare: ({ converter }) => () =>
      new HtmlConverter({ images: converter.images }),
  },
};

export interface ConverterSetup {
  extensions: readonly string[];
  createConverter: ConverterFactory;
}

/**
 * @throws ConfigurationError when the backend cannot run with this config
 */
export function createConverterFactory(
  config: ConversionConfig,
  env: NodeJS.ProcessEnv = process.env,
): ConverterSetup {
  const name = config.converter.backend;
  const backend = BACKENDS[name];

  const requested: TextFormat[] =
    config.converter.format === "both"
      ? ["markdown", "text"]
      : [config.converter.format];
  const unsupported = requested.filter((f) => !backend.formats.includes(f));
  if (unsupported.length > 0) {
    throw new ConfigurationError(
      `The ${name} backend cannot produce ${unsupported.join(" or ")} output`,
    );
  }

  return {
    extensions: backend.extensions,
    createConverter: backend.prepare(config, env),
  };
}

export { DoclingConverter } from "./docling";
export { MarkerConverter } from "./marker";
export { LlamaParseConverter, LLAMA_API_KEY_ENV } from "./llamaparse";
export { HtmlConverter } from "./html";
