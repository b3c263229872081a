/**
 * Central type exports
 */

// Configuration
export type {
  BackendName,
  ResultFormat,
  ConverterConfig,
  WorkersConfig,
  CommandBackendConfig,
  LlamaParseConfig,
  BackendsConfig,
  LoggingConfig,
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "./config";
export {
  MAX_TIMEOUT_MS,
  BackendNameSchema,
  ResultFormatSchema,
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Files
export type {
  WorkItem,
  FailureReason,
  ConversionSuccess,
  ConversionFailure,
  ConversionOutcome,
  ItemResult,
} from "./files";

// Converter
export type {
  PageText,
  DocumentAsset,
  ConvertedDocument,
  ConvertOptions,
  Converter,
  ConverterFactory,
} from "./converter";

// Context
export type {
  DeviceClass,
  ProgressEvent,
  ProgressListener,
  BatchContext,
  RunResult,
  RunSummary,
} from "./context";
