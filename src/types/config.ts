/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

export const BackendNameSchema = z.enum(["docling", "marker", "llamaparse", "html"]);

// Which text artifacts each item produces
export const ResultFormatSchema = z.enum(["markdown", "text", "both"]);

// Largest delay setTimeout honors; longer ones fire at once
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ConverterConfigSchema = z.object({
  backend: BackendNameSchema,
  format: ResultFormatSchema,
  // Materialize figure/page assets and reference them by path
  images: z.boolean(),
  language: z.string(),
  // Per-item limit in milliseconds, 0 disables it
  timeout: z.number().int().nonnegative().max(MAX_TIMEOUT_MS),
});

// Worker ceilings per device class; `max` replaces the lookup when set
export const WorkersConfigSchema = z.object({
  cuda: z.number().int().positive(),
  mps: z.number().int().positive(),
  none: z.number().int().positive(),
  max: z.number().int().positive().optional(),
});

export const CommandBackendConfigSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()),
});

export const LlamaParseConfigSchema = z.object({
  baseUrl: z.url(),
  parseMode: z.string(),
  pollInterval: z.number().int().positive(),
});

export const BackendsConfigSchema = z.object({
  docling: CommandBackendConfigSchema,
  marker: CommandBackendConfigSchema,
  llamaparse: LlamaParseConfigSchema,
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  converter: ConverterConfigSchema,
  workers: WorkersConfigSchema,
  // Write <stem>_meta.json next to each converted item
  metadata: z.boolean(),
  backends: BackendsConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialConversionConfigSchema =
  ConversionConfigSchema.partial().extend({
    converter: ConverterConfigSchema.partial().optional(),
    workers: WorkersConfigSchema.partial().optional(),
    backends: z
      .object({
        docling: CommandBackendConfigSchema.partial().optional(),
        marker: CommandBackendConfigSchema.partial().optional(),
        llamaparse: LlamaParseConfigSchema.partial().optional(),
      })
      .optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

export type BackendName = z.infer<typeof BackendNameSchema>;
export type ResultFormat = z.infer<typeof ResultFormatSchema>;
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type WorkersConfig = z.infer<typeof WorkersConfigSchema>;
export type CommandBackendConfig = z.infer<typeof CommandBackendConfigSchema>;
export type LlamaParseConfig = z.infer<typeof LlamaParseConfigSchema>;
export type BackendsConfig = z.infer<typeof BackendsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
